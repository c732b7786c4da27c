import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage, ExecutionError, StatementTimeoutError } from './errors';
import { SQL_DRIVER, SqlDriver, SqlSession } from './sql-driver';
import { ExecutionResult, TargetDatabase } from './types';

export const MAX_ROWS = 500;
export const STATEMENT_TIMEOUT_MS = 10_000;

// SQLSTATE query_canceled, raised when statement_timeout expires.
const QUERY_CANCELED = '57014';

function isStatementTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === QUERY_CANCELED;
}

@Injectable()
export class QueryExecutorService {
  private readonly logger = new Logger(QueryExecutorService.name);

  constructor(@Inject(SQL_DRIVER) private readonly driver: SqlDriver) {}

  /**
   * Runs an already validated SELECT on its own connection with a server-side
   * statement timeout and a row cap. The connection is closed on every path.
   * No retries: every failure surfaces as an ExecutionError.
   */
  async execute(target: TargetDatabase, sql: string, signal?: AbortSignal): Promise<ExecutionResult> {
    signal?.throwIfAborted();

    const session = await this.open(target);

    const onAbort = () => {
      this.logger.warn('Execution aborted by caller, closing connection');
      session.close().catch((error: unknown) => {
        this.logger.warn(`Failed to close aborted connection: ${errorMessage(error)}`);
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      signal?.throwIfAborted();
      await session.setStatementTimeout(STATEMENT_TIMEOUT_MS);

      const started = performance.now();
      const { columns, rows } = await session.query(sql, MAX_ROWS);
      const elapsedMs = Math.max(0, Math.round(performance.now() - started));

      const capped = rows.length > MAX_ROWS ? rows.slice(0, MAX_ROWS) : rows;
      this.logger.log(`Query returned ${capped.length} rows in ${elapsedMs}ms`);
      return { columns, rows: capped, elapsedMs, rowCount: capped.length };
    } catch (error) {
      if (isStatementTimeout(error)) {
        throw new StatementTimeoutError(
          `Query exceeded the ${STATEMENT_TIMEOUT_MS / 1000}s statement timeout and was cancelled.`,
          { cause: error },
        );
      }
      throw new ExecutionError(errorMessage(error), { cause: error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await this.release(session);
    }
  }

  private async open(target: TargetDatabase): Promise<SqlSession> {
    try {
      return await this.driver.connect(target);
    } catch (error) {
      throw new ExecutionError(`Could not connect to the database: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async release(session: SqlSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger.warn(`Failed to close database connection: ${errorMessage(error)}`);
    }
  }
}
