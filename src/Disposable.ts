/**
 * Something that can release the resources it holds.
 *
 * Disposing does not have to end an object's life: a collection that is disposed
 * is emptied and stays usable. Implementations that become unusable after
 * `dispose()` must say so.
 */
export interface Disposable {
  dispose(): void;
}

export const isDisposable = (value: unknown): value is Disposable => {
  return typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function';
};
