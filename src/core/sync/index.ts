// src/core/sync/index.ts

export * from './escalation.service';
export * from './invoice-sync.service';
export * from './interfaces/services';
export * from './run-summary';
