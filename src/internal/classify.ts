import { z } from 'zod';
import type { Binding } from '~/types';
import { ClassificationError } from './errors';
import { logger } from './logger';
import { controllerOf, innermost } from './registry';

/** @internal Registered symbol so that markers survive duplicated copies of the library. */
export const methodDescriptorKey = Symbol.for('veneer.method-descriptor');

/** @internal */
export type BindingHint = 'class' | 'class-method';

/** @internal */
export type MethodDescriptor = z.infer<typeof methodDescriptorSchema>;

const methodDescriptorSchema = z.object({
  kind: z.enum(['class-method', 'static-method']),
  function: z.custom<Function>((value) => typeof value === 'function')
});

/**
 * @internal
 * Result of classifying a wrap target. `target` is what the proxy stands for, `callee` is what
 * gets bound and called (they differ for method descriptors, which delegate to the function they
 * mark).
 */
export type Classification =
  | {
      readonly binding: Exclude<Binding, 'instance-method'>;
      readonly target: Function;
      readonly callee: Function;
    }
  | {
      readonly binding: 'instance-method';
      readonly target: Function;
      readonly callee: Function;
      readonly instance: object;
    };

/**
 * @internal
 * ES classes, and built-in constructors (`Map`, `Date`, `Error`, ...): native functions that
 * carry a `prototype` object.
 */
export function isClass(value: unknown): boolean {
  if (typeof value !== 'function') {
    return false;
  }

  const source = Function.prototype.toString.call(value);

  if (/^class\b/.test(source)) {
    return true;
  }

  const prototype: unknown = Object.hasOwn(value, 'prototype') ? Reflect.get(value, 'prototype') : undefined;

  return /\{\s*\[native code\]\s*\}$/.test(source) && typeof prototype === 'object' && prototype !== null;
}

/** @internal */
export function methodDescriptorOf(value: Function): MethodDescriptor | undefined {
  if (!Object.hasOwn(value, methodDescriptorKey)) {
    return undefined;
  }

  const result = methodDescriptorSchema.safeParse(Reflect.get(value, methodDescriptorKey));

  if (!result.success) {
    throw new ClassificationError(value, 'it carries a method descriptor this version does not understand');
  }

  return result.data;
}

/** @internal */
export function classify(target: unknown, hint?: BindingHint): Classification {
  const classification = classifyTarget(target, hint);

  logger.debug({ binding: classification.binding, target: classification.target.name }, 'classified wrap target');

  return classification;
}

function classifyTarget(target: unknown, hint: BindingHint | undefined): Classification {
  if (typeof target !== 'function') {
    throw new ClassificationError(target, 'expected a function, a class or a method descriptor');
  }

  const controller = controllerOf(target);
  const inherited = controller?.classification;

  if (inherited) {
    // Nesting keeps the inner binding; the outer layer calls the inner proxy.
    return inherited.binding === 'instance-method'
      ? { binding: 'instance-method', target, callee: target, instance: inherited.instance }
      : { binding: inherited.binding, target, callee: target };
  }

  const descriptor = methodDescriptorOf(target);

  if (descriptor) {
    return { binding: descriptor.kind, target, callee: descriptor.function };
  }

  if (hint) {
    return { binding: hint, target, callee: target };
  }

  return { binding: isClass(controller ? innermost(target) : target) ? 'class' : 'function', target, callee: target };
}
