// Main entry point for the gateway recreate tooling
export * from './types';
export * from './errors';
export * from './config';
export * from './runtime';
export * from './env/environment-store';
export * from './http/https-client';
export * from './health/readiness-prober';
export * from './provisioning';
export * from './verification';
export * from './orchestration';
export * from './reporting/console-reporter';
export * from './utils/clock';

// Main recreate function
export { recreate } from './orchestration/factory';
