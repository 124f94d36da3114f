import { InvalidConfigurationError } from './errors';
import LibLogger from './logger';

const logger = LibLogger.get('Options');

/**
 * Policy deciding which entry leaves the cache once it reaches its maximum size
 *
 * - `lru`: the least recently read or written entry
 * - `lfu`: the entry with the smallest recorded access count
 * - `oldest-insertion`: the entry inserted first, reads and rewrites do not count
 */
export type RemovalPolicy = 'lru' | 'lfu' | 'oldest-insertion';

export const REMOVAL_POLICIES: readonly RemovalPolicy[] = ['lru', 'lfu', 'oldest-insertion'];

/**
 * Configuration options for a cache
 */
export interface CacheOptions {
  /** Maximum number of entries held at once (positive integer) */
  maximumSize: number;
  /** Removal policy applied when the cache is full */
  removalPolicy: RemovalPolicy;
}

export const DEFAULT_CACHE_OPTIONS: Pick<CacheOptions, 'removalPolicy'> = {
  removalPolicy: 'lru'
};

export const isRemovalPolicy = (value: unknown): value is RemovalPolicy => {
  return typeof value === 'string' && REMOVAL_POLICIES.some(policy => policy === value);
};

/**
 * Create cache options, filling in defaults for anything not given
 */
export const createOptions = (
  options: Partial<CacheOptions> & Pick<CacheOptions, 'maximumSize'>
): CacheOptions => {
  return {
    ...DEFAULT_CACHE_OPTIONS,
    ...options
  };
};

const fail = (message: string, field: string, invalidValue: unknown): never => {
  logger.error('Invalid cache configuration', {
    component: 'cache',
    subcomponent: 'Options',
    operation: 'validateOptions',
    field,
    invalidValue: String(invalidValue),
    message
  });
  throw new InvalidConfigurationError(message, field, invalidValue);
};

const propertySuggestions: Record<string, string> = {
  maxSize: 'maximumSize',
  maximum_size: 'maximumSize',
  maximumsize: 'maximumSize',
  maxItems: 'maximumSize',
  size: 'maximumSize',
  policy: 'removalPolicy',
  removal_policy: 'removalPolicy',
  removalpolicy: 'removalPolicy',
  evictionPolicy: 'removalPolicy',
  removalEntryPolicy: 'removalPolicy'
};

const policySuggestions: Record<string, RemovalPolicy> = {
  LRU: 'lru',
  LFU: 'lfu',
  fifo: 'oldest-insertion',
  FIFO: 'oldest-insertion',
  oldestInsertion: 'oldest-insertion',
  OldestInsertion: 'oldest-insertion',
  oldest_insertion: 'oldest-insertion',
  LeastRecentlyUsed: 'lru',
  LeastFrequentlyUsed: 'lfu'
};

export const validateMaximumSize = (maximumSize: unknown): number => {
  if (typeof maximumSize !== 'number' || !Number.isInteger(maximumSize) || maximumSize <= 0) {
    return fail(
      `maximumSize must be a positive integer, got ${typeof maximumSize} (${String(maximumSize)}). ` +
      'Suggestion: Use a positive whole number (1, 2, 3, ...) for maximumSize.',
      'maximumSize',
      maximumSize
    );
  }
  return maximumSize;
};

export const validateRemovalPolicy = (removalPolicy: unknown): RemovalPolicy => {
  if (isRemovalPolicy(removalPolicy)) {
    return removalPolicy;
  }
  const suggestion = typeof removalPolicy === 'string' ? policySuggestions[removalPolicy] : undefined;
  return fail(
    `Invalid removal policy: "${String(removalPolicy)}". ` +
    (suggestion ? `Did you mean "${suggestion}"? ` : '') +
    `Valid policies are: ${REMOVAL_POLICIES.join(', ')}.`,
    'removalPolicy',
    removalPolicy
  );
};

/**
 * Validate cache options, throwing InvalidConfigurationError on the first problem found
 */
export const validateOptions = (options: CacheOptions): void => {
  const validProperties = new Set<string>(['maximumSize', 'removalPolicy']);

  const unknownProperties = Object.keys(options).filter(key => !validProperties.has(key));
  if (unknownProperties.length > 0) {
    const described = unknownProperties.map(prop => {
      const suggestion = propertySuggestions[prop];
      return suggestion ? `"${prop}" → "${suggestion}"` : `"${prop}"`;
    });
    fail(
      `Unknown configuration properties: ${described.join(', ')}. ` +
      `Valid properties are: ${Array.from(validProperties).join(', ')}.`,
      unknownProperties[0],
      unknownProperties.join(', ')
    );
  }

  validateMaximumSize(options.maximumSize);
  validateRemovalPolicy(options.removalPolicy);
};
