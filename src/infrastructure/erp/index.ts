// src/infrastructure/erp/index.ts

export * from './client-credentials.token-provider';
export * from './erp-api.gateway';
