// src/infrastructure/billing/module-billing.provider.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { IBillingSystemProvider } from '../../core/billing';
import { BillingSystemError } from '../../core/common/errors';
import { SourceInvoice } from '../../core/common/interfaces/models';
import { IntegrationSettings, SETTINGS_TOKEN } from '../../core/common/interfaces/settings';
import { formatIsoDate } from '../../core/common/utils';
import { LOGGER_TOKEN } from '../logger';
import { BILLING_COMPONENT_FACTORY_TOKEN, BillingComponent, BillingComponentFactory } from './billing-component';
import { hasErpReference, parseBillingInvoices } from './billing-payload.parser';

/**
 * IBillingSystemProvider over a vendor billing component. Every call gets its own
 * component instance: created, initialized, used once, then disposed.
 */
@singleton()
@injectable()
export class ModuleBillingProvider implements IBillingSystemProvider {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(SETTINGS_TOKEN) private settings: IntegrationSettings,
        @inject(BILLING_COMPONENT_FACTORY_TOKEN) private createComponent: BillingComponentFactory
    ) {
        this.logger.info('ModuleBillingProvider initialized.');
    }

    async fetchUnprocessedInvoices(startDate: Date, endDate: Date, signal?: AbortSignal): Promise<SourceInvoice[]> {
        const from = formatIsoDate(startDate);
        const to = formatIsoDate(endDate);
        this.logger.info(`Retrieving unprocessed invoices from billing system for ${from} to ${to}`);

        const invoices = await this.withComponent('Failed to retrieve invoices from billing system', signal, async component => {
            const payload = await component.getInvoicesForDateRange(from, to, false);
            return parseBillingInvoices(payload);
        });

        const unprocessed = invoices.filter(invoice => !hasErpReference(invoice));
        if (unprocessed.length < invoices.length) {
            this.logger.warn(`Billing system returned ${invoices.length - unprocessed.length} already processed invoice(s); skipping them`);
        }
        return unprocessed;
    }

    async writeBackReference(invoiceNumber: string, erpReference: string, signal?: AbortSignal): Promise<void> {
        this.logger.debug(`Writing ERP reference ${erpReference} back to billing invoice ${invoiceNumber}`);

        await this.withComponent(`Failed to update invoice ${invoiceNumber} in billing system`, signal, async component => {
            const updated = await component.updateInvoiceErpReference(invoiceNumber, erpReference);
            if (!updated) {
                const lastError = await component.getLastError();
                throw new BillingSystemError(`Billing system error: ${lastError || 'unknown error'}`);
            }
            if (signal?.aborted) {
                // The caller has already given up and dead-lettered the invoice
                this.logger.warn(
                    `Late write-back: invoice ${invoiceNumber} was updated with ERP reference ${erpReference} after its timeout; do not resubmit it`
                );
            }
        });
    }

    private async withComponent<T>(
        failureMessage: string,
        signal: AbortSignal | undefined,
        work: (component: BillingComponent) => Promise<T>
    ): Promise<T> {
        let component: BillingComponent | null = null;
        try {
            signal?.throwIfAborted();
            component = await this.createComponent();
            await component.initialize(this.settings.billing.connectionConfig);
            signal?.throwIfAborted();
            return await work(component);
        } catch (error) {
            if (error instanceof BillingSystemError) throw error;
            throw new BillingSystemError(failureMessage, error instanceof Error ? error : undefined);
        } finally {
            if (component?.dispose) {
                await this.dispose(component);
            }
        }
    }

    private async dispose(component: BillingComponent): Promise<void> {
        try {
            await component.dispose?.();
        } catch (error) {
            this.logger.warn('Billing component dispose failed', { message: error instanceof Error ? error.message : String(error) });
        }
    }
}
