/** @internal */
type Storage<K, V> = {
  has(key: K): boolean;
  get(key: K): V | undefined;
  set(key: K, value: V): unknown;
};

/** @internal */
export function emplace<K, V>(target: Storage<K, V>, key: K, factory: () => V): V {
  if (target.has(key)) {
    return target.get(key)!;
  } else {
    const value = factory();

    target.set(key, value);

    return value;
  }
}
