export * from './types';
export * from './http-token-provisioner';
export * from './exec-token-provisioner';
export * from './token-persistence';
