// src/core/erp/index.ts

export * from './interfaces/services';
