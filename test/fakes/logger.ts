// test/fakes/logger.ts
import winston from 'winston';

export const createTestLogger = (): winston.Logger =>
    winston.createLogger({ silent: true, transports: [new winston.transports.Console({ silent: true })] });
