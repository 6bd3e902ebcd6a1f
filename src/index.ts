/**
 * Perp Execution Engine
 *
 * Public entry point.
 */

export { App } from './app.js';
export type { AppOptions } from './app.js';
export { config } from './config.js';
export type { Config } from './config.js';
export { logger } from './logger.js';

export * from './account/index.js';
export * from './codec/index.js';
export * from './exchange/index.js';
export * from './execution/index.js';
export * from './market/index.js';
