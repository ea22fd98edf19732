import { type Classification, ClassificationError, controllerOf, emplace, isClass, isProxyable, register } from '~/internal';
import type { Proxied } from '~/types';

/** @internal Methods that must keep the proxy as `this` so calls through them stay intercepted. */
const passthroughCalls = new Set<PropertyKey>(['call', 'apply', 'bind']);

function isLocal(property: PropertyKey): property is `_self_${string}` {
  return typeof property === 'string' && property.startsWith('_self_');
}

/**
 * 🎯 Transparent proxy around a single target object. Everything the proxy does not handle
 * itself (property reads and writes, `in`, key listing, prototype queries, calls, construction)
 * reaches the target, so `instanceof`, `Array.isArray`, `typeof`, iteration and `toString` all
 * answer as the target would.
 *
 * The proxy keeps only:
 * - `__wrapped__`: the target, read-only;
 * - `__wrapperState__`: a free slot for whoever created the proxy;
 * - `_self_*` properties, stored on the proxy instead of the target.
 *
 * Methods inherited by the target come back bound to it (and cached per proxy), so they reach
 * private fields and internal slots. They are not the prototype's functions: `proxy.norm` is
 * not `Point.prototype.norm`, and its `name` is `bound norm`.
 *
 * Subclasses change call behavior by overriding `call` and `construct`; the value callers use
 * is `proxy`, never the `ObjectProxy` instance itself.
 *
 * Usage:
 * ```typescript
 * const target = { count: 1 };
 * const proxy = new ObjectProxy(target).proxy;
 *
 * proxy.count = 2; // target.count === 2
 * ```
 */
export class ObjectProxy<T extends object> {
  readonly __wrapped__: T;
  __wrapperState__: unknown = undefined;
  readonly proxy: T;

  /** Target methods bound to the target, so reading one twice yields the same function. */
  readonly #methods = new WeakMap<Function, Function>();

  constructor(wrapped: T) {
    // 🚫 Proxies need an object target
    if (!isProxyable(wrapped)) {
      throw new ClassificationError(wrapped, 'only objects and functions can be proxied');
    }

    this.__wrapped__ = wrapped;
    this.proxy = new Proxy(wrapped, {
      get: (target, property, receiver) =>
        receiver === this.proxy ? this.read(property) : Reflect.get(target, property, receiver),
      set: (target, property, value, receiver) =>
        receiver === this.proxy ? this.write(property, value) : Reflect.set(target, property, value, receiver),
      deleteProperty: (_, property) => this.remove(property),
      has: (target, property) => this.isReserved(property) || Reflect.has(target, property),
      apply: (_, thisArg, args) => this.call(thisArg, args),
      construct: (_, args, newTarget) => this.construct(args, newTarget)
    });

    register(this.proxy, this);
  }

  /** Binding classification; only callable wrappers have one. */
  get classification(): Classification | undefined {
    return undefined;
  }

  protected isReserved(property: PropertyKey): boolean {
    return property === '__wrapped__' || property === '__wrapperState__' || (isLocal(property) && property in this);
  }

  protected read(property: PropertyKey): unknown {
    if (property === '__wrapped__') {
      return this.__wrapped__;
    }

    if (property === '__wrapperState__') {
      return this.__wrapperState__;
    }

    if (isLocal(property)) {
      return Reflect.get(this, property);
    }

    const target = this.__wrapped__;
    const value: unknown = Reflect.get(target, property);

    // Own properties, constructors and classes come back untouched
    if (typeof value !== 'function' || property === 'constructor' || Object.hasOwn(target, property) || isClass(value)) {
      return value;
    }

    if (typeof target === 'function' && passthroughCalls.has(property)) {
      return value;
    }

    // 🔗 Inherited methods run against the target (private fields, internal slots)
    return emplace(this.#methods, value, () => value.bind(target));
  }

  protected write(property: PropertyKey, value: unknown): boolean {
    if (property === '__wrapped__') {
      return false;
    }

    if (property === '__wrapperState__') {
      this.__wrapperState__ = value;

      return true;
    }

    if (isLocal(property)) {
      return Reflect.set(this, property, value);
    }

    // A refused write surfaces exactly as refusing it on the target would
    return Reflect.set(this.__wrapped__, property, value);
  }

  protected remove(property: PropertyKey): boolean {
    if (property === '__wrapped__') {
      return false;
    }

    if (property === '__wrapperState__') {
      this.__wrapperState__ = undefined;

      return true;
    }

    if (isLocal(property)) {
      return Reflect.deleteProperty(this, property);
    }

    return Reflect.deleteProperty(this.__wrapped__, property);
  }

  protected call(thisArg: unknown, args: Array<unknown>): unknown {
    const target = this.__wrapped__;

    if (typeof target !== 'function') {
      throw new TypeError('proxy target is not callable');
    }

    return Reflect.apply(target, thisArg, args);
  }

  protected construct(args: Array<unknown>, newTarget: Function): object {
    const target = this.__wrapped__;

    if (typeof target !== 'function') {
      throw new TypeError('proxy target is not a constructor');
    }

    return Reflect.construct(target, args, newTarget);
  }
}

/**
 * 🎯 Wraps `target` in a transparent proxy.
 *
 * Usage:
 * ```typescript
 * const list = wrapObject([1, 2, 3]);
 *
 * Array.isArray(list); // true
 * [...list]; // [1, 2, 3]
 * unwrap(list); // the original array
 * ```
 */
export function wrapObject<T extends object>(target: T): Proxied<T>;
export function wrapObject(target: object): unknown {
  return new ObjectProxy(target).proxy;
}

/** Whether `value` is a proxy created by this library. */
export function isWrapped(value: unknown): boolean {
  return controllerOf(value) !== undefined;
}

/**
 * Returns the target of a proxy (one layer), or `value` itself when it is not one. Recovers
 * the original by identity: `unwrap(wrapObject(x)) === x`.
 */
export function unwrap<T>(value: Proxied<T>): T;
export function unwrap<T>(value: T): T;
export function unwrap(value: unknown): unknown {
  return controllerOf(value)?.__wrapped__ ?? value;
}
