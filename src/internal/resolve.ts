import type { Binding, Wrapped } from '~/types';
import type { Classification } from './classify';
import { BindingError } from './errors';
import { logger } from './logger';
import { isProxyable } from './registry';

/** @internal Binding context of a single call. */
export type Resolution<A extends Array<unknown>, R> = {
  readonly binding: Binding;
  readonly instance: object | null;
  readonly wrapped: Wrapped<A, R>;
};

/** @internal */
export function bindTo<A extends Array<unknown>, R>(callee: Wrapped<A, R>, receiver: object): Wrapped<A, R> {
  return Function.prototype.bind.call(callee, receiver);
}

/** @internal A prototype object: owns a `constructor` whose `prototype` points back at it. */
function isPrototypeObject(value: object): boolean {
  if (!Object.hasOwn(value, 'constructor')) {
    return false;
  }

  const owner: unknown = Reflect.get(value, 'constructor');

  return typeof owner === 'function' && Reflect.get(owner, 'prototype') === value;
}

/**
 * @internal
 * The class a receiver belongs to. Accepts a class, a class prototype, or an instance whose
 * `constructor` really owns its prototype.
 */
export function ownerOf(accessor: unknown): Function {
  if (typeof accessor === 'function') {
    return accessor;
  }

  if (isProxyable(accessor)) {
    const owner: unknown = Reflect.get(accessor, 'constructor');

    if (
      typeof owner === 'function' &&
      (Reflect.get(owner, 'prototype') === Object.getPrototypeOf(accessor) || isPrototypeObject(accessor))
    ) {
      return owner;
    }

    throw new BindingError(accessor, 'its constructor does not own its prototype');
  }

  throw new BindingError(accessor, 'a class method needs a class, a class prototype or an instance as receiver');
}

/**
 * @internal
 * Resolves the binding context from the receiver a call was made through. Runs on every call;
 * the result is never stored on the receiver.
 */
export function resolve<A extends Array<unknown>, R>(
  classification: Classification,
  callee: Wrapped<A, R>,
  accessor: unknown
): Resolution<A, R> {
  const resolution = resolveAccessor(classification, callee, accessor);

  logger.trace({ binding: resolution.binding, bound: resolution.instance !== null }, 'resolved binding');

  return resolution;
}

function resolveAccessor<A extends Array<unknown>, R>(
  classification: Classification,
  callee: Wrapped<A, R>,
  accessor: unknown
): Resolution<A, R> {
  switch (classification.binding) {
    case 'instance-method': {
      return { binding: 'instance-method', instance: classification.instance, wrapped: callee };
    }
    case 'class':
    case 'static-method': {
      return { binding: classification.binding, instance: null, wrapped: callee };
    }
    case 'class-method': {
      const owner = ownerOf(accessor);

      return { binding: 'class-method', instance: owner, wrapped: bindTo(callee, owner) };
    }
    case 'function': {
      if (accessor === undefined || accessor === null) {
        return { binding: 'function', instance: null, wrapped: callee };
      }

      if (!isProxyable(accessor)) {
        throw new BindingError(accessor, 'a method receiver must be an object');
      }

      // Reached through the class itself rather than an instance: unbound access.
      if (typeof accessor === 'function' || isPrototypeObject(accessor)) {
        return { binding: 'function', instance: null, wrapped: callee };
      }

      return { binding: 'instance-method', instance: accessor, wrapped: bindTo(callee, accessor) };
    }
  }
}
