import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('pluggable-cache');

export default LibLogger;
