import { Logger } from '@nestjs/common';
import { Pool } from 'pg';
import { AuditRecord } from './types';

export const AUDIT_STORE = Symbol('AUDIT_STORE');

export interface AuditStore {
  write(record: AuditRecord): Promise<void>;
  close?(): Promise<void>;
}

const INSERT_QUERY_LOG = `
  INSERT INTO query_logs
    (connection_id, namespace, question, generated_sql, status, row_count, exec_time_ms, error_message, created_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
`;

/**
 * Writes audit records to the application database. This pool is for our own
 * database only; user target databases never go through it.
 */
export class PgAuditStore implements AuditStore {
  private readonly logger = new Logger(PgAuditStore.name);
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
    this.logger.log('Audit records will be written to the application database');
  }

  async write(record: AuditRecord): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(INSERT_QUERY_LOG, [
        record.connectionId,
        record.namespace,
        record.question,
        record.sql,
        record.status,
        record.rowCount,
        record.execTimeMs,
        record.error,
        record.finishedAt,
      ]);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.log('Audit connection pool closed');
  }
}

/** Used when no application database is configured. */
export class LogAuditStore implements AuditStore {
  private readonly logger = new Logger('QueryAudit');

  async write(record: AuditRecord): Promise<void> {
    const timing = record.execTimeMs === null ? '' : ` rows=${record.rowCount} time=${record.execTimeMs}ms`;
    const failure = record.error === null ? '' : ` error="${record.error}"`;
    this.logger.log(`[${record.status}] namespace=${record.namespace} question="${record.question}"${timing}${failure}`);
  }
}
