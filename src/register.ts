// src/register.ts

import { container, Lifecycle } from "tsyringe";
import { loadIntegrationSettings } from "./config";
import { BILLING_SYSTEM_PROVIDER_TOKEN } from "./core/billing";
import { SYNC_RUN_REPOSITORY_TOKEN } from "./core/common/interfaces/repositories";
import { IntegrationSettings, SETTINGS_TOKEN } from "./core/common/interfaces/settings";
import { ERP_GATEWAY_TOKEN, TOKEN_PROVIDER_TOKEN } from "./core/erp";
import { INVOICE_MAPPER_TOKEN, InvoiceMapperService } from "./core/mapping";
import { RUN_REPORT_SERVICE_TOKEN, RunReportService } from "./core/reporting";
import { EscalationService, INVOICE_SYNC_SERVICE_TOKEN, InvoiceSyncService, NOTIFIER_TOKEN } from "./core/sync";
import { BILLING_COMPONENT_FACTORY_TOKEN, lazyModuleComponentFactory, ModuleBillingProvider } from "./infrastructure/billing";
import { AppDataSource } from "./infrastructure/database/providers/data-source.provider";
import { SyncRunRepository } from "./infrastructure/database/repositories/sync-run.repository";
import { ClientCredentialsTokenProvider, ErpApiGateway } from "./infrastructure/erp";
import loggerInstance, { LOGGER_TOKEN } from "./infrastructure/logger";
import { WebhookNotifier } from "./infrastructure/notification";
import { ScheduledSyncTrigger } from "./infrastructure/scheduler";
import { InvoiceSyncController } from "./infrastructure/webserver/controllers/invoice-sync.controller";

/**
 * Registers every service with the container. Settings are read from the
 * environment unless supplied, and throw a ConfigurationError when incomplete.
 */
export function registerDependencies(settings: IntegrationSettings = loadIntegrationSettings()): void {
    // Logger first: every other service injects it
    container.register(LOGGER_TOKEN, { useValue: loggerInstance });
    loggerInstance.debug("--- Starting Dependency Registration ---");

    container.register(SETTINGS_TOKEN, { useValue: settings });

    // Infrastructure. Token registrations are singletons: the gateway caches its token
    // and the orchestrator tracks the active run.
    container.registerSingleton(AppDataSource);
    container.register(SYNC_RUN_REPOSITORY_TOKEN, { useClass: SyncRunRepository }, { lifecycle: Lifecycle.Singleton });
    container.register(BILLING_COMPONENT_FACTORY_TOKEN, {
        useValue: lazyModuleComponentFactory(settings.billing.modulePath)
    });
    container.register(BILLING_SYSTEM_PROVIDER_TOKEN, { useClass: ModuleBillingProvider }, { lifecycle: Lifecycle.Singleton });
    container.register(TOKEN_PROVIDER_TOKEN, { useClass: ClientCredentialsTokenProvider }, { lifecycle: Lifecycle.Singleton });
    container.register(ERP_GATEWAY_TOKEN, { useClass: ErpApiGateway }, { lifecycle: Lifecycle.Singleton });
    container.register(NOTIFIER_TOKEN, { useClass: WebhookNotifier }, { lifecycle: Lifecycle.Singleton });

    // Core services
    container.register(INVOICE_MAPPER_TOKEN, { useClass: InvoiceMapperService }, { lifecycle: Lifecycle.Singleton });
    container.registerSingleton(EscalationService);
    container.register(INVOICE_SYNC_SERVICE_TOKEN, { useClass: InvoiceSyncService }, { lifecycle: Lifecycle.Singleton });
    container.register(RUN_REPORT_SERVICE_TOKEN, { useClass: RunReportService }, { lifecycle: Lifecycle.Singleton });

    // Triggers
    container.registerSingleton(ScheduledSyncTrigger);
    container.registerSingleton(InvoiceSyncController);

    loggerInstance.debug("--- Dependency Registration Complete ---");
}
