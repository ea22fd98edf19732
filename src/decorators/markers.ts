import { ClassificationError, type MethodDescriptor, methodDescriptorKey, ownerOf } from '~/internal';

/** @internal */
function describeMethod<F extends Function>(descriptor: F, kind: MethodDescriptor['kind'], original: Function): F {
  const payload: MethodDescriptor = Object.freeze({ kind, function: original });

  Object.defineProperty(descriptor, methodDescriptorKey, { value: payload });
  Object.defineProperty(descriptor, 'name', { value: original.name, configurable: true });

  return descriptor;
}

/**
 * 🎯 Marks a method as a class method: it runs with the class as `this`, whether it is called
 * on the class, a subclass or an instance. Decorators applied on top of it report the class as
 * their `instance`.
 *
 * Usage:
 * ```typescript
 * class Shape {
 *   @logged @classMethod owner(this: unknown): unknown {
 *     return this;
 *   }
 * }
 *
 * new Shape().owner(); // Shape
 * ```
 */
export function classMethod<This, F extends (this: This, ...args: never[]) => unknown>(
  method: F,
  context?: ClassMethodDecoratorContext<This, F>
): F;
export function classMethod(method: unknown, _context?: unknown): unknown {
  if (typeof method !== 'function') {
    throw new ClassificationError(method, 'classMethod() expects a function');
  }

  const original = method;

  return describeMethod(
    function (this: unknown, ...args: Array<unknown>): unknown {
      return Reflect.apply(original, ownerOf(this), args);
    },
    'class-method',
    original
  );
}

/**
 * 🎯 Marks a method as static in the binding sense: it runs without a receiver, and decorators
 * applied on top of it always report `null` as their `instance`.
 *
 * Usage:
 * ```typescript
 * class Units {
 *   @logged @staticMethod toMeters(feet: number): number {
 *     return feet * 0.3048;
 *   }
 * }
 * ```
 */
export function staticMethod<This, F extends (this: This, ...args: never[]) => unknown>(
  method: F,
  context?: ClassMethodDecoratorContext<This, F>
): F;
export function staticMethod(method: unknown, _context?: unknown): unknown {
  if (typeof method !== 'function') {
    throw new ClassificationError(method, 'staticMethod() expects a function');
  }

  const original = method;

  return describeMethod(
    function (...args: Array<unknown>): unknown {
      return Reflect.apply(original, undefined, args);
    },
    'static-method',
    original
  );
}
