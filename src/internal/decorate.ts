import type { BindingHint } from './classify';
import { ClassificationError } from './errors';

/** @internal What a decorator does with the values TC39 decorator syntax hands it. */
export type Application = {
  wrap(target: unknown, hint?: BindingHint): unknown;
  bind(decorated: unknown, receiver: unknown): unknown;
};

/** @internal */
export function decorate(value: unknown, context: DecoratorContext, application: Application): unknown {
  // Dispatch based on decorator kind
  switch (context.kind) {
    case 'class': {
      return application.wrap(value, 'class');
    }
    case 'method': {
      // Static methods run with the class as `this`: a class method
      return application.wrap(value, context.static ? 'class-method' : undefined);
    }
    case 'field': {
      // For arrow-function fields, we return an initializer bound to the instance under construction
      // (or to the class, for static fields)
      const hint = context.static ? 'class-method' : undefined;

      return function (this: unknown, initial: unknown) {
        return application.bind(application.wrap(initial, hint), this);
      };
    }
    default: {
      throw new ClassificationError(value, `decorators do not apply to ${context.kind} ${String(context.name)}`);
    }
  }
}
