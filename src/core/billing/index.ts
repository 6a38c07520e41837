// src/core/billing/index.ts

export * from './interfaces/services';
