// src/infrastructure/billing/index.ts

export * from './billing-component';
export * from './billing-payload.parser';
export * from './module-billing.provider';
