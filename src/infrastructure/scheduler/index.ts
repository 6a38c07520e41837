// src/infrastructure/scheduler/index.ts

export * from './scheduled-sync.trigger';
