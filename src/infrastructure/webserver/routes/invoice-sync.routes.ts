// src/infrastructure/webserver/routes/invoice-sync.routes.ts
import { Router } from 'express';
import { container } from 'tsyringe';
import { InvoiceSyncController } from '../controllers/invoice-sync.controller';

/**
 * Routes mounted under /api/invoice. Built on demand so the controller
 * is resolved after dependency registration.
 */
export function createInvoiceSyncRouter(): Router {
    const router = Router();
    const controller = container.resolve(InvoiceSyncController);

    // POST /api/invoice/sync - Run a sync for { FromDate, ToDate }
    router.post('/sync', controller.handleManualSync);

    // GET /api/invoice/sync/unconfirmed - Dead-letter list
    router.get('/sync/unconfirmed', controller.handleListUnconfirmed);

    // GET /api/invoice/sync/runs/:runId - Stored run summary
    router.get('/sync/runs/:runId', controller.handleGetRun);

    // GET /api/invoice/sync/runs/:runId/report - Run summary as Excel
    router.get('/sync/runs/:runId/report', controller.handleDownloadReport);

    return router;
}
