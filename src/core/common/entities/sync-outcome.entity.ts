// src/core/common/entities/sync-outcome.entity.ts
import {
    Column,
    Entity,
    Index,
    PrimaryGeneratedColumn,
} from 'typeorm';

/**
 * One invoice outcome of a run. Rows with errorKind 'reconciliation' form the
 * dead-letter list: the ERP holds the invoice but the billing system was never updated.
 */
@Entity('invoice_sync_outcomes')
@Index(['runId', 'sequence'], { unique: true })
export class SyncOutcomeRecord {

    @PrimaryGeneratedColumn('increment')
    id!: number;

    @Column({ type: 'nvarchar', length: 36 })
    runId!: string;

    // Arrival order within the run
    @Column({ type: 'int' })
    sequence!: number;

    @Index()
    @Column({ type: 'nvarchar', length: 100 })
    invoiceNumber!: string;

    @Column({ type: 'nvarchar', length: 20 }) // 'Succeeded' | 'Failed'
    status!: string;

    @Index()
    @Column({ type: 'nvarchar', length: 20, nullable: true })
    errorKind!: string | null;

    @Column({ type: 'nvarchar', length: 'MAX', nullable: true })
    errorMessage!: string | null;

    @Column({ type: 'nvarchar', length: 100, nullable: true })
    erpInvoiceId!: string | null;

    @Column({ type: 'datetime2' })
    recordedAt!: Date;
}
