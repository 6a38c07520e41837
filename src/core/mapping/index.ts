// src/core/mapping/index.ts

export * from './invoice-mapper.service';
export * from './interfaces/services';
