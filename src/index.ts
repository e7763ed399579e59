/**
 * Spread Hedger - library entry point
 * Quotes resting limit orders on a primary venue and hedges every fill on a secondary venue
 */

export * from './models';
export * from './services';
export * from './connectors';
export * from './config';
export * from './utils/ErrorHandler';
export * from './utils/consoleSink';
export { ControlServer, ControlTarget, ControlServerOptions, ApiResponse, HealthState } from './web/server';

// Application version and metadata
export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Spread Hedger';
