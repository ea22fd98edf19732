/** @internal */
export function describeValue(value: unknown): string {
  if (typeof value === 'function') {
    return value.name ? `function ${value.name}` : 'anonymous function';
  }

  if (value === null || value === undefined) {
    return String(value);
  }

  if (typeof value === 'object') {
    const prototype: unknown = Object.getPrototypeOf(value);

    return prototype === null ? 'object with null prototype' : `instance of ${nameOf(Reflect.get(value, 'constructor'))}`;
  }

  return `${typeof value} ${String(value)}`;
}

function nameOf(value: unknown): string {
  return typeof value === 'function' && value.name ? value.name : 'unknown class';
}

/**
 * Raised at wrap time when the target cannot be classified: not a function or class, a
 * primitive handed to `wrapObject`, or a method descriptor left by an incompatible copy of the
 * library.
 */
export class ClassificationError extends TypeError {
  readonly target: unknown;

  constructor(target: unknown, reason: string) {
    super();

    this.name = 'ClassificationError';
    this.message = `cannot wrap ${describeValue(target)}: ${reason}`;
    this.target = target;
  }
}

/**
 * Raised while resolving the binding context of a call, when the receiver has a shape the
 * binding cannot be derived from.
 */
export class BindingError extends TypeError {
  readonly accessor: unknown;

  constructor(accessor: unknown, reason: string) {
    super();

    this.name = 'BindingError';
    this.message = `cannot bind through ${describeValue(accessor)}: ${reason}`;
    this.accessor = accessor;
  }
}
