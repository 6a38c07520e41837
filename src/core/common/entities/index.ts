// src/core/common/entities/index.ts

export * from './sync-outcome.entity';
export * from './sync-run.entity';
