export * from './types';
export * from './verification-runner';
export * from './checks';
