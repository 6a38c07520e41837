// src/infrastructure/scheduler/scheduled-sync.trigger.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { ConflictError, errorMessage } from '../../core/common/errors';
import { RunSummary } from '../../core/common/interfaces/models';
import { IntegrationSettings, SETTINGS_TOKEN } from '../../core/common/interfaces/settings';
import { formatIsoDate } from '../../core/common/utils';
import { IInvoiceSyncService, INVOICE_SYNC_SERVICE_TOKEN } from '../../core/sync';
import { LOGGER_TOKEN } from '../logger';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Window for a scheduled run: from `lookbackDays` days before the start of today (UTC) up to now.
 */
export function scheduledWindow(now: Date, lookbackDays: number): { fromDate: Date; toDate: Date } {
    const startOfToday = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
    return {
        fromDate: new Date(startOfToday - lookbackDays * DAY_MS),
        toDate: now,
    };
}

/**
 * Fires a sync run every `intervalMinutes`. A tick never throws; failures are logged
 * and the orchestrator's own escalation covers them.
 */
@singleton()
@injectable()
export class ScheduledSyncTrigger {
    private timer: NodeJS.Timeout | null = null;
    private currentTick: Promise<RunSummary | null> | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(SETTINGS_TOKEN) private settings: IntegrationSettings,
        @inject(INVOICE_SYNC_SERVICE_TOKEN) private syncService: IInvoiceSyncService
    ) {
        this.logger.info('ScheduledSyncTrigger initialized.');
    }

    get isStarted(): boolean {
        return this.timer !== null;
    }

    start(): void {
        const { schedulerEnabled, intervalMinutes } = this.settings.sync;
        if (!schedulerEnabled) {
            this.logger.info('Invoice sync scheduler is disabled.');
            return;
        }
        if (this.timer) {
            return;
        }
        this.timer = setInterval(() => {
            this.currentTick = this.tick();
        }, intervalMinutes * 60 * 1000);
        this.logger.info(`Invoice sync scheduler started; running every ${intervalMinutes} minute(s).`);
    }

    /** Stops future ticks and waits for a tick already in progress. */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            this.logger.info('Invoice sync scheduler stopped.');
        }
        if (this.currentTick) {
            await this.currentTick;
        }
    }

    /**
     * Runs one scheduled sync.
     * @returns the run summary, or null when the tick was skipped or the run aborted.
     */
    async tick(now: Date = new Date()): Promise<RunSummary | null> {
        if (this.syncService.isRunning) {
            this.logger.warn('Skipping scheduled invoice sync: a run is already in progress.');
            return null;
        }

        const { fromDate, toDate } = scheduledWindow(now, this.settings.sync.lookbackDays);
        this.logger.info(`Scheduled invoice sync triggered for ${formatIsoDate(fromDate)} to ${formatIsoDate(toDate)}`);
        try {
            return await this.syncService.runSync({ fromDate, toDate, trigger: 'scheduled' });
        } catch (error) {
            if (error instanceof ConflictError) {
                this.logger.warn('Skipping scheduled invoice sync: a run is already in progress.');
            } else {
                this.logger.error(`Scheduled invoice sync failed: ${errorMessage(error)}`);
            }
            return null;
        }
    }
}
