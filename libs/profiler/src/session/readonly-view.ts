/**
 * Read-only live view over an array owned by someone else.
 *
 * Reads go straight to the backing array, so appends made by the owner show
 * up in a view taken earlier. Every write through the view throws.
 */
export function createReadonlyView<T>(target: T[], description = 'collection'): readonly T[] {
  const reject = (): never => {
    throw new TypeError(`Cannot modify ${description}: it is a read-only view`);
  };

  return new Proxy(target, {
    set: reject,
    deleteProperty: reject,
    defineProperty: reject,
    setPrototypeOf: reject,
    preventExtensions: reject,
  });
}
