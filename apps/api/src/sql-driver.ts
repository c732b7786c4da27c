import { Injectable, Logger } from '@nestjs/common';
import { Client } from 'pg';
import Cursor from 'pg-cursor';
import { TargetDatabase } from './types';

export const SQL_DRIVER = Symbol('SQL_DRIVER');

export interface QueryRows {
  columns: string[];
  rows: unknown[][];
}

/** One connection to a target database, owned by a single execution. */
export interface SqlSession {
  setStatementTimeout(ms: number): Promise<void>;
  /** Runs the statement and materialises at most `maxRows` rows. */
  query(sql: string, maxRows: number): Promise<QueryRows>;
  /** Idempotent. */
  close(): Promise<void>;
}

export interface SqlDriver {
  connect(target: TargetDatabase): Promise<SqlSession>;
}

const CONNECT_TIMEOUT_MS = 5_000;

function readRows(cursor: Cursor<unknown[]>, maxRows: number): Promise<QueryRows> {
  return new Promise<QueryRows>((resolve, reject) => {
    cursor.read(maxRows, (error, rows, result) => {
      if (error) {
        reject(error);
        return;
      }
      resolve({ columns: result.fields.map((field) => field.name), rows });
    });
  });
}

class PgSession implements SqlSession {
  private closed = false;
  private readonly ended: Promise<void>;

  constructor(private readonly client: Client) {
    this.ended = new Promise<void>((resolve) => {
      client.once('end', () => resolve());
    });
  }

  async setStatementTimeout(ms: number): Promise<void> {
    await this.client.query(`SET statement_timeout = ${Math.trunc(ms)}`);
  }

  async query(sql: string, maxRows: number): Promise<QueryRows> {
    const cursor = this.client.query(new Cursor<unknown[]>(sql, [], { rowMode: 'array' }));
    // A failed read leaves the cursor to die with the connection: close()
    // waits for a readyForQuery that an ended socket never sends.
    const rows = await readRows(cursor, maxRows);
    await Promise.race([cursor.close(), this.ended]);
    return rows;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.end();
  }
}

/**
 * Opens a dedicated pg Client per execution. Target databases are never
 * pooled, so nothing leaks between users.
 */
@Injectable()
export class PgSqlDriver implements SqlDriver {
  private readonly logger = new Logger(PgSqlDriver.name);

  async connect(target: TargetDatabase): Promise<SqlSession> {
    const client = new Client({
      connectionString: target.connectionString,
      connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
      application_name: 'sql-guarded-query',
    });
    // Dropped connections are reported here as well as to the running query.
    client.on('error', (error) => {
      this.logger.warn(`Target database connection error: ${error.message}`);
    });
    await client.connect();
    return new PgSession(client);
  }
}
