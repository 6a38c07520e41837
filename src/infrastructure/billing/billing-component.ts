// src/infrastructure/billing/billing-component.ts
import path from 'path';
import { BillingSystemError } from '../../core/common/errors';

/**
 * Call surface of the vendor billing component. Any method may be synchronous.
 * Dates cross the boundary as yyyy-MM-dd strings and invoices as a JSON array.
 */
export interface BillingComponent {
    initialize(connectionConfig: string): void | Promise<void>;
    getInvoicesForDateRange(startDate: string, endDate: string, includeProcessed: boolean): string | Promise<string>;
    /** @returns false on failure; getLastError() then explains why */
    updateInvoiceErpReference(invoiceNumber: string, erpReference: string): boolean | Promise<boolean>;
    getLastError(): string | Promise<string>;
    dispose?(): void | Promise<void>;
}

/** Creates a fresh, uninitialized component instance. */
export type BillingComponentFactory = () => BillingComponent | Promise<BillingComponent>;

export const BILLING_COMPONENT_FACTORY_TOKEN = Symbol.for('BillingComponentFactory');

const REQUIRED_METHODS = [
    'initialize',
    'getInvoicesForDateRange',
    'updateInvoiceErpReference',
    'getLastError',
] as const;

export function isBillingComponent(value: unknown): value is BillingComponent {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    // Reflect.get walks the prototype chain, so class instances qualify
    return REQUIRED_METHODS.every(method => typeof Reflect.get(value, method) === 'function');
}

/**
 * Loads a billing component module. The module must export a factory function,
 * either as `createBillingComponent` or as its default export.
 * @throws {BillingSystemError} when the module cannot be loaded or exports no factory.
 */
export async function loadBillingComponentModule(modulePath: string): Promise<BillingComponentFactory> {
    let loaded: unknown;
    try {
        loaded = await import(path.resolve(modulePath));
    } catch (error) {
        throw new BillingSystemError(
            `Could not load billing component module ${modulePath}`,
            error instanceof Error ? error : undefined
        );
    }

    const exported: unknown = typeof loaded === 'object' && loaded !== null
        ? Reflect.get(loaded, 'createBillingComponent') ?? Reflect.get(loaded, 'default')
        : undefined;
    if (typeof exported !== 'function') {
        throw new BillingSystemError(`Billing component module ${modulePath} does not export a component factory`);
    }

    return async () => {
        const instance: unknown = await Reflect.apply(exported, undefined, []);
        if (!isBillingComponent(instance)) {
            throw new BillingSystemError(`Billing component from ${modulePath} does not implement the expected methods`);
        }
        return instance;
    };
}

/**
 * Factory that loads the component module on first use and reuses it afterwards.
 * A failed load is retried on the next call.
 */
export function lazyModuleComponentFactory(modulePath: string): BillingComponentFactory {
    let factoryPromise: Promise<BillingComponentFactory> | null = null;
    return async () => {
        if (!factoryPromise) {
            factoryPromise = loadBillingComponentModule(modulePath).catch((error: unknown) => {
                factoryPromise = null;
                throw error;
            });
        }
        const factory = await factoryPromise;
        return factory();
    };
}
