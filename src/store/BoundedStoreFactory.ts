import { InvalidConfigurationError } from '../errors';
import { RemovalPolicy } from '../Options';
import { AccessOrderStore } from './AccessOrderStore';
import { BoundedStore } from './BoundedStore';
import { FrequencyStore } from './FrequencyStore';

/**
 * Factory function to create the store implementing a removal policy
 */
export function createBoundedStore<K, V>(
  removalPolicy: RemovalPolicy,
  maximumSize: number
): BoundedStore<K, V> {
  switch (removalPolicy) {
    case 'lru':
      return new AccessOrderStore<K, V>(maximumSize, true);
    case 'oldest-insertion':
      return new AccessOrderStore<K, V>(maximumSize, false);
    case 'lfu':
      return new FrequencyStore<K, V>(maximumSize);
    default:
      throw new InvalidConfigurationError(
        `Unsupported removal policy: ${String(removalPolicy)}`,
        'removalPolicy',
        removalPolicy
      );
  }
}
