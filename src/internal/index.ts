export * from './classify';
export * from './config';
export * from './decorate';
export * from './emplace';
export * from './errors';
export * from './logger';
export * from './registry';
export * from './resolve';
