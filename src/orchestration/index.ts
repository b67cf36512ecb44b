export * from './types';
export * from './steps';
export * from './recreate-orchestrator';
export * from './factory';
