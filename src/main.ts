// src/main.ts

import 'reflect-metadata';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import config, { describeSettings } from './config';
import { IntegrationSettings, SETTINGS_TOKEN } from './core/common/interfaces/settings';
import { IInvoiceSyncService, INVOICE_SYNC_SERVICE_TOKEN } from './core/sync';
import { AppDataSource } from './infrastructure/database/providers/data-source.provider';
import loggerInstance, { LOGGER_TOKEN } from './infrastructure/logger';
import { ScheduledSyncTrigger } from './infrastructure/scheduler';
import { Server } from './infrastructure/webserver/server';
import { registerDependencies } from './register';

async function bootstrap(): Promise<void> {
    try {
        // --- STEP 0: Settings and DI container ---
        registerDependencies();
        const logger = container.resolve<Logger>(LOGGER_TOKEN);
        const settings = container.resolve<IntegrationSettings>(SETTINGS_TOKEN);

        logger.info(`Application starting in ${config.nodeEnv} mode...`);
        logger.info(`Using port: ${config.port}`);
        logger.info('Integration settings loaded.', describeSettings(settings));

        // --- STEP 1: Database (run history) ---
        const dataSourceProvider = container.resolve(AppDataSource);
        logger.info('Initializing database connection...');
        await dataSourceProvider.init();
        logger.info('Database connection initialized successfully.');

        // --- STEP 2: HTTP server ---
        const server = container.resolve(Server);
        logger.info('Starting HTTP server...');
        await server.start(config.port);

        // --- STEP 3: Scheduler ---
        container.resolve(ScheduledSyncTrigger).start();
    } catch (error) {
        if (error instanceof Error) {
            loggerInstance.error('Failed to bootstrap application:', { message: error.message, stack: error.stack });
        } else {
            loggerInstance.error('Failed to bootstrap application with unknown error:', { error: String(error) });
        }
        process.exit(1);
    }
}

async function gracefulShutdown(signal: string): Promise<void> {
    const logger = loggerInstance;
    logger.warn(`Received ${signal}. Initiating graceful shutdown...`);

    try {
        if (container.isRegistered(ScheduledSyncTrigger)) {
            const scheduler = container.resolve(ScheduledSyncTrigger);
            const syncService = container.resolve<IInvoiceSyncService>(INVOICE_SYNC_SERVICE_TOKEN);
            // Undispatched invoices are left for the next run; in-flight ones finish
            syncService.cancelActiveRun(`Shutdown on ${signal}`);
            await scheduler.stop();
        }

        if (container.isRegistered(Server)) {
            await container.resolve(Server).stop();
            logger.info('HTTP server stopped.');
        }

        if (container.isRegistered(AppDataSource)) {
            logger.info('Closing database connection...');
            await container.resolve(AppDataSource).close();
        }

        logger.info('Application shut down gracefully.');
        process.exit(0);
    } catch (error) {
        logger.error('Error during graceful shutdown:', { message: error instanceof Error ? error.message : String(error) });
        process.exit(1);
    }
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); }); // Ctrl+C

void bootstrap();
