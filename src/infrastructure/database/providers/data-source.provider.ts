// src/infrastructure/database/providers/data-source.provider.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from "tsyringe";
import { DataSource, DataSourceOptions } from "typeorm";
import winston from "winston";

import config, { AppConfig } from "../../../config";
import { LOGGER_TOKEN } from "../../logger";

import { SyncOutcomeRecord, SyncRunRecord } from "../../../core/common/entities";
import { errorMessage } from "../../../core/common/errors";

export function buildDataSourceOptions(database: AppConfig['database']): DataSourceOptions {
    return {
        type: database.type,
        host: database.host,
        port: database.port,
        username: database.username,
        password: database.password,
        database: database.database,
        synchronize: database.synchronize,
        logging: database.logging,
        entities: [SyncRunRecord, SyncOutcomeRecord],
        subscribers: [],
        migrations: [],
        connectionTimeout: 150000,
        extra: {
            trustServerCertificate: true // local/non-prod SQL Server
        },
        options: {
            encrypt: false,
        },
    };
}

@singleton()
@injectable()
export class AppDataSource {

    private _dataSource: DataSource | null = null;
    private readonly logger: winston.Logger;

    constructor(@inject(LOGGER_TOKEN) logger: winston.Logger) {
        this.logger = logger;
        this.logger.info('AppDataSource service initialized.');
    }

    async init(): Promise<DataSource> {
        if (this._dataSource && this._dataSource.isInitialized) {
            this.logger.debug("AppDataSource: DataSource already initialized.");
            return this._dataSource;
        }

        if (!this._dataSource) {
            this.logger.info("AppDataSource: Creating new DataSource instance.");
            const options = buildDataSourceOptions(config.database);
            this.logger.info(`AppDataSource: Configuring DataSource for ${config.database.database} on ${config.database.host}:${config.database.port}`);
            this._dataSource = new DataSource(options);
        }

        try {
            this.logger.info("AppDataSource: Attempting to initialize TypeORM DataSource...");
            await this._dataSource.initialize();
            this.logger.info(`AppDataSource: TypeORM DataSource initialized successfully! [${config.database.database}@${config.database.host}]`);
        } catch (err) {
            this.logger.error("AppDataSource: Error during Data Source initialization", {
                message: errorMessage(err),
                stack: err instanceof Error ? err.stack : undefined,
                db_host: config.database.host,
                db_name: config.database.database
            });
            this._dataSource = null;
            throw err;
        }

        return this._dataSource;
    }

    async close(): Promise<void> {
        if (this._dataSource && this._dataSource.isInitialized) {
            this.logger.info("AppDataSource: Attempting to close TypeORM DataSource...");
            try {
                await this._dataSource.destroy();
                this.logger.info("AppDataSource: TypeORM DataSource has been closed successfully!");
                this._dataSource = null;
            } catch (err) {
                this.logger.error("AppDataSource: Error during Data Source closing", { message: errorMessage(err) });
                throw err;
            }
        } else {
            this.logger.warn("AppDataSource: Close called but DataSource was not initialized.");
            this._dataSource = null;
        }
    }
}
