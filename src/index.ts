export * from './memory/index.js';
export * from './core/module.js';
export * from './core/result.js';
export * from './core/logger.js';
export * from './core/registry.js';
export * from './config/index.js';
