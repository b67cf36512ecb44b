export * from './process-runner';
export * from './container-runtime';
