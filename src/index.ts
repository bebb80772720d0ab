// Public entry point
export * from './api';
export * from './lib';
export * from './errors';
export * from './types';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { ClientConfig } from './config';
