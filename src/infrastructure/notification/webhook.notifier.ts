// src/infrastructure/notification/webhook.notifier.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { errorMessage } from '../../core/common/errors';
import { IntegrationSettings, SETTINGS_TOKEN } from '../../core/common/interfaces/settings';
import { withTimeout } from '../../core/common/utils';
import { INotifier, NotificationSeverity } from '../../core/sync';
import { LOGGER_TOKEN } from '../logger';

/**
 * Logs every notification and, when a webhook URL is configured, posts it as JSON.
 * Delivery failures reject so the caller can log them against the run.
 */
@singleton()
@injectable()
export class WebhookNotifier implements INotifier {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(SETTINGS_TOKEN) private settings: IntegrationSettings
    ) {
        this.logger.info('WebhookNotifier initialized.');
    }

    async notify(severity: NotificationSeverity, message: string): Promise<void> {
        if (severity === 'critical') {
            this.logger.error(`CRITICAL: ${message}`);
        } else {
            this.logger.warn(`Invoice sync failure notification: ${message}`);
        }

        const webhookUrl = this.settings.notification.webhookUrl;
        if (!webhookUrl) {
            return;
        }

        const payload = { severity, message, timestamp: new Date().toISOString() };
        const response = await withTimeout('Notification webhook', this.settings.sync.remoteCallTimeoutMs, signal =>
            fetch(webhookUrl, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
                signal,
            })
        ).catch((error: unknown) => {
            throw new Error(`Notification webhook request failed: ${errorMessage(error)}`);
        });

        if (!response.ok) {
            throw new Error(`Notification webhook returned HTTP ${response.status}`);
        }
        this.logger.debug(`Delivered ${severity} notification to webhook`);
    }
}
