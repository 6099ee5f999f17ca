/**
 * Configuration barrel
 */

export * from './constants';
export { createAppConfig, type AppConfig } from './app-config';
