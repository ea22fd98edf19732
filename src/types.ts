/**
 * How a decorated callable relates to its receiver.
 *
 * `'instance-method'` is never the result of classifying a plain function: it is what a
 * `'function'` becomes once a call resolves it against an object, and what wrapping an already
 * bound wrapper inherits.
 */
export type Binding = 'function' | 'instance-method' | 'class-method' | 'static-method' | 'class';

/**
 * The callable handed to a wrapper function. Functions are invoked as `wrapped(...args)`,
 * classes as `new wrapped(...args)`.
 */
export type Wrapped<A extends Array<unknown> = Array<unknown>, R = unknown> = ((...args: A) => R) & (new (...args: A) => R);

/**
 * User logic run in place of the decorated callable. It decides whether and how `wrapped`
 * runs; whatever it returns or throws is what the caller sees.
 */
export type WrapperFunction<A extends Array<unknown> = Array<unknown>, R = unknown> = (
  wrapped: Wrapped<A, R>,
  instance: object | null,
  args: A
) => R;

/** Surface every proxy adds on top of its target. */
export type ProxySurface<T> = {
  readonly __wrapped__: T;
  __wrapperState__: unknown;
};

export type Proxied<T> = T & ProxySurface<T>;

export type Decorated<T> = Proxied<T> & {
  readonly _self_wrapper: Function;
  readonly _self_binding: Binding;
  readonly _self_instance: object | null;
};
