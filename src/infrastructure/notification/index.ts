// src/infrastructure/notification/index.ts

export * from './webhook.notifier';
