/**
 * Library entry point
 */

export { buildApp, createApp, type AppDeps, type AppOptions } from './app.js';
export * from './modules/health/index.js';
