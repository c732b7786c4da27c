import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { AUDIT_STORE, AuditStore } from './audit-store';
import { errorMessage } from './errors';
import { AuditRecord } from './types';

/**
 * Supervises audit writes. Each record is written on its own task with its
 * own failure domain: a failed write is logged and never reaches the run
 * that produced it.
 */
@Injectable()
export class AuditService implements OnModuleDestroy {
  private readonly logger = new Logger(AuditService.name);
  private readonly pending = new Set<Promise<void>>();

  constructor(@Inject(AUDIT_STORE) private readonly store: AuditStore) {}

  dispatch(record: AuditRecord): void {
    const task: Promise<void> = Promise.resolve()
      .then(() => this.store.write(record))
      .catch((error: unknown) => {
        this.logger.warn(`Failed to write audit record (${record.status}): ${errorMessage(error)}`);
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Waits for every write dispatched so far. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.drain();
    await this.store.close?.();
  }
}
