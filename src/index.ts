export { decorator, parameterized, type Decorator } from './decorators/decorator';
export { classMethod, staticMethod } from './decorators/markers';
export { BindingError, ClassificationError, configure, createLogger, getConfig, useLogger, type Config, type ConfigOptions } from './internal';
export { BoundCallableWrapper, resolveBinding } from './proxies/bound';
export { CallableWrapper } from './proxies/callable';
export { isWrapped, ObjectProxy, unwrap, wrapObject } from './proxies/object';
export type { Binding, Decorated, Proxied, ProxySurface, Wrapped, WrapperFunction } from './types';
