import type { ObjectProxy } from '~/proxies/object';

/** @internal */
const controllers = new WeakMap<object, ObjectProxy<object>>();

/** @internal */
export function isProxyable(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/** @internal */
export function register(proxy: object, controller: ObjectProxy<object>): void {
  controllers.set(proxy, controller);
}

/** @internal */
export function controllerOf(value: unknown): ObjectProxy<object> | undefined {
  return isProxyable(value) ? controllers.get(value) : undefined;
}

/** @internal Follows `__wrapped__` through every proxy layer down to the original object. */
export function innermost(value: object): object {
  let current = value;

  for (let controller = controllerOf(current); controller; controller = controllerOf(current)) {
    current = controller.__wrapped__;
  }

  return current;
}
