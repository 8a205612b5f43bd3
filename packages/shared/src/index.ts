/**
 * @kline-bot/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the trader and its tooling.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './logger.js';
export * from './utils/load-env.js';
