/**
 * Graph Runner: a minimal workflow/state-machine executor.
 *
 * Public exports for programmatic use. The HTTP server is started from
 * main.ts.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './engine';
export * from './nodes';
export * from './storage';
