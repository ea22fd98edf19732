import { type BindingHint, classify, decorate, logger } from '~/internal';
import { bindDecorated } from '~/proxies/bound';
import { CallableWrapper } from '~/proxies/callable';
import type { Decorated, WrapperFunction } from '~/types';

/**
 * A decorator built by `decorator()`. Apply it to a value directly, or with TC39 decorator syntax
 * to a class, a method or a function-valued field.
 */
export type Decorator = {
  <T extends Function>(target: T): Decorated<T>;
  <This, F extends (this: This, ...args: never[]) => unknown>(value: F, context: ClassMethodDecoratorContext<This, F>): Decorated<F>;
  <This, F extends (this: This, ...args: never[]) => unknown>(
    value: undefined,
    context: ClassFieldDecoratorContext<This, F>
  ): (this: This, initial: F) => Decorated<F>;
  <C extends abstract new (...args: never[]) => unknown>(value: C, context: ClassDecoratorContext<C>): Decorated<C>;
};

/**
 * 🎯 Builds a decorator out of a wrapper function. Every call of a decorated function, method or
 * class goes to `wrapper(wrapped, instance, args)` instead, and the wrapper decides whether and
 * how `wrapped` runs. The decorated value keeps the identity-facing surface of the original:
 * `name`, `length`, `prototype`, `instanceof`, own properties.
 *
 * `instance` is:
 * - `null` for plain function calls, static methods and classes;
 * - the object a method was called on;
 * - the class for class methods (`static` methods and `@classMethod`).
 *
 * Usage:
 * ```typescript
 * const traced = decorator((wrapped, instance, args) => {
 *   console.log('calling', wrapped.name, 'on', instance);
 *
 *   return wrapped(...args);
 * });
 *
 * class Greeter {
 *   @traced greet(name: string): string {
 *     return `hi ${name}`;
 *   }
 * }
 *
 * const add = traced((a: number, b: number) => a + b);
 * ```
 *
 * @param wrapper receives the callable to run (already bound to the instance or class where a
 * binding applies), the binding context and the call arguments
 */
export function decorator<A extends Array<unknown> = Array<unknown>, R = unknown>(wrapper: WrapperFunction<A, R>): Decorator {
  if (typeof wrapper !== 'function') {
    throw new TypeError('decorator() expects a wrapper function');
  }

  logger.debug({ wrapper: wrapper.name }, 'created decorator');

  const wrap = (target: unknown, hint?: BindingHint): Function => new CallableWrapper(classify(target, hint), wrapper).proxy;

  function apply<T extends Function>(target: T): Decorated<T>;
  function apply<This, F extends (this: This, ...args: never[]) => unknown>(
    value: F,
    context: ClassMethodDecoratorContext<This, F>
  ): Decorated<F>;
  function apply<This, F extends (this: This, ...args: never[]) => unknown>(
    value: undefined,
    context: ClassFieldDecoratorContext<This, F>
  ): (this: This, initial: F) => Decorated<F>;
  function apply<C extends abstract new (...args: never[]) => unknown>(value: C, context: ClassDecoratorContext<C>): Decorated<C>;
  function apply(value: unknown, context?: DecoratorContext): unknown {
    if (context === undefined) {
      return wrap(value);
    }

    return decorate(value, context, { wrap, bind: bindDecorated });
  }

  return apply;
}

/**
 * 🎯 Builds decorators that take their own arguments: `factory` receives the decorator
 * arguments and returns the wrapper function to use.
 *
 * Usage:
 * ```typescript
 * const retried = parameterized((attempts: number) => (wrapped, _instance, args) => {
 *   for (let attempt = 1; ; attempt++) {
 *     try {
 *       return wrapped(...args);
 *     } catch (error) {
 *       if (attempt >= attempts) throw error;
 *     }
 *   }
 * });
 *
 * class Client {
 *   @retried(3) send(payload: string): void { ... }
 * }
 * ```
 */
export function parameterized<P extends Array<unknown>, A extends Array<unknown> = Array<unknown>, R = unknown>(
  factory: (...params: P) => WrapperFunction<A, R>
): (...params: P) => Decorator {
  return (...params: P) => decorator(factory(...params));
}
