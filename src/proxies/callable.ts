import { type Classification, ClassificationError, isProxyable, resolve, type Resolution } from '~/internal';
import type { Binding, Wrapped, WrapperFunction } from '~/types';
import { ObjectProxy } from './object';

/** @internal */
function isCallable<A extends Array<unknown>, R>(value: unknown): value is Wrapped<A, R> {
  return typeof value === 'function';
}

/**
 * 🎯 Proxy around a function or class whose invocations go to a wrapper function instead of
 * the target. The wrapper receives the callable to run, the binding context and the arguments:
 *
 * - `instance` is `null` for plain calls, static methods and classes;
 * - the receiver object for methods called through an instance;
 * - the class for class methods.
 *
 * The binding is resolved from `this` on every call, so one wrapper stored on a prototype
 * serves every instance.
 */
export class CallableWrapper<A extends Array<unknown> = Array<unknown>, R = unknown> extends ObjectProxy<Function> {
  readonly #wrapper: WrapperFunction<A, R>;
  readonly #classification: Classification;
  readonly #callee: Wrapped<A, R>;

  constructor(classification: Classification, wrapper: WrapperFunction<A, R>) {
    super(classification.target);

    const { callee } = classification;

    if (!isCallable<A, R>(callee)) {
      throw new ClassificationError(callee, 'the callee is not callable');
    }

    this.#wrapper = wrapper;
    this.#classification = classification;
    this.#callee = callee;
  }

  override get classification(): Classification {
    return this.#classification;
  }

  get _self_wrapper(): WrapperFunction<A, R> {
    return this.#wrapper;
  }

  get _self_binding(): Binding {
    return this.#classification.binding;
  }

  get _self_instance(): object | null {
    return this.#classification.binding === 'instance-method' ? this.#classification.instance : null;
  }

  /** Binding context of a call made with `accessor` as `this`. */
  resolve(accessor: unknown): Resolution<A, R> {
    return resolve(this.#classification, this.#callee, accessor);
  }

  protected override call(thisArg: unknown, args: A): R {
    const { wrapped, instance } = this.resolve(thisArg);

    return this.#wrapper(wrapped, instance, args);
  }

  protected override construct(args: A, newTarget: Function): object {
    // `super()` from a subclass builds on the original class, as `extends` of the class itself would
    if (newTarget !== this.proxy) {
      return super.construct(args, newTarget);
    }

    const result = this.call(undefined, args);

    if (!isProxyable(result)) {
      throw new TypeError(`wrapper of ${this.#classification.target.name || 'anonymous constructor'} must construct an object`);
    }

    return result;
  }
}
