// src/infrastructure/logger/index.ts
import winston from 'winston';
import config, { AppConfig } from '../../config';

// --- Define Logger Creation Function ---
export const createAppLogger = (appConfig: AppConfig = config): winston.Logger => {
    // Determine log format based on environment
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }), // Log stack traces
        appConfig.nodeEnv === 'production'
            ? winston.format.json()
            : winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message} ${info.stack ? '\n' + info.stack : ''}`)
    );

    // Define transports
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: appConfig.nodeEnv === 'development'
                ? winston.format.combine(
                    winston.format.colorize(),
                    logFormat
                )
                : logFormat,
            level: appConfig.logLevel,
            handleExceptions: true,
            handleRejections: true,
        }),
    ];

    // Create the logger instance
    const logger = winston.createLogger({
        level: appConfig.logLevel,
        format: logFormat,
        transports: transports,
        exitOnError: false,
        silent: appConfig.nodeEnv === 'test',
    });

    logger.info(`Logger initialized successfully in ${appConfig.nodeEnv} mode (Level: ${appConfig.logLevel}).`);
    return logger;
};

// --- Create Logger Instance ---
const loggerInstance = createAppLogger();

// --- Dependency Injection Token ---
export const LOGGER_TOKEN = Symbol.for('AppLogger');

// --- Export ---
export default loggerInstance; // Export the instance for direct use
