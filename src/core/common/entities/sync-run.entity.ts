// src/core/common/entities/sync-run.entity.ts
import {
    Column,
    CreateDateColumn,
    Entity,
    Index,
    PrimaryColumn,
} from 'typeorm';

@Entity('invoice_sync_runs')
export class SyncRunRecord {

    @PrimaryColumn({ type: 'nvarchar', length: 36 }) // uuid v4
    runId!: string;

    @Column({ type: 'nvarchar', length: 20 }) // 'scheduled' | 'manual'
    trigger!: string;

    @Column({ type: 'datetime2' })
    fromDate!: Date;

    @Column({ type: 'datetime2' })
    toDate!: Date;

    @Index()
    @Column({ type: 'datetime2' })
    startedAt!: Date;

    @Column({ type: 'datetime2' })
    finishedAt!: Date;

    @Column({ type: 'int', default: 0 })
    succeededCount!: number;

    @Column({ type: 'int', default: 0 })
    failedCount!: number;

    @Column({ type: 'bit', default: false })
    cancelled!: boolean;

    @Column({ type: 'nvarchar', length: 'MAX', nullable: true })
    fatalError!: string | null;

    @CreateDateColumn({ type: 'datetime2', default: () => 'GETDATE()' })
    createdAt!: Date;
}
