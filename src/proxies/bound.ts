import { BindingError, controllerOf, type Resolution } from '~/internal';
import type { Binding, Decorated } from '~/types';
import { CallableWrapper } from './callable';

/**
 * 🎯 Snapshot of a decorated callable resolved against one receiver, the counterpart of a
 * bound method. Calls ignore `this` and always report the resolved instance.
 */
export class BoundCallableWrapper<A extends Array<unknown> = Array<unknown>, R = unknown> extends CallableWrapper<A, R> {
  readonly #parent: CallableWrapper<A, R>;
  readonly #resolution: Resolution<A, R>;

  constructor(parent: CallableWrapper<A, R>, resolution: Resolution<A, R>) {
    super(
      resolution.instance === null
        ? { binding: resolution.binding === 'instance-method' ? 'function' : resolution.binding, target: resolution.wrapped, callee: resolution.wrapped }
        : { binding: 'instance-method', target: resolution.wrapped, callee: resolution.wrapped, instance: resolution.instance },
      parent._self_wrapper
    );

    this.#parent = parent;
    this.#resolution = resolution;
  }

  get _self_parent(): Function {
    return this.#parent.proxy;
  }

  override get _self_binding(): Binding {
    return this.#resolution.binding;
  }

  override get _self_instance(): object | null {
    return this.#resolution.instance;
  }

  override resolve(): Resolution<A, R> {
    return this.#resolution;
  }
}

/** @internal */
export function bindDecorated(decorated: unknown, accessor: unknown): Function {
  const controller = controllerOf(decorated);

  if (!(controller instanceof CallableWrapper)) {
    throw new BindingError(decorated, 'only decorated callables can be bound');
  }

  return new BoundCallableWrapper(controller, controller.resolve(accessor)).proxy;
}

/**
 * 🎯 Resolves a decorated callable against `accessor` once, the way reading a method off an
 * object binds it. The result keeps reporting `accessor` (or its class, for class methods) as
 * the instance wherever it is called from.
 *
 * Usage:
 * ```typescript
 * const greet = resolveBinding(Greeter.prototype.greet, greeter);
 *
 * greet('Sam'); // wrapper sees instance === greeter
 * ```
 */
export function resolveBinding<T extends Function>(decorated: T, accessor: unknown): Decorated<OmitThisParameter<T>>;
export function resolveBinding(decorated: unknown, accessor: unknown): unknown {
  return bindDecorated(decorated, accessor);
}
