import { Injectable, Logger } from '@nestjs/common';
import { AuditService } from './audit.service';
import { errorMessage } from './errors';
import { errorEvent, statusEvent } from './pipeline-events';
import { QueryExecutorService } from './query-executor.service';
import { SchemaRetrieverService } from './schema-retriever.service';
import { SqlGeneratorService } from './sql-generator.service';
import { validateSql } from './sql-validator';
import { AuditRecord, ExecutionResult, PipelineEvent, PipelineRequest, PipelineState, RunStatus } from './types';

const TERMINAL_STATUS: Record<RunStatus, PipelineState> = {
  success: 'succeeded',
  validation_error: 'validation_rejected',
  error: 'failed',
  cancelled: 'cancelled',
};

/**
 * Retrieve -> generate -> validate -> execute, as one stream of events.
 *
 * Stages run strictly in order and never retry. Exactly one terminal event
 * (done or error) ends the stream. sql_chunk events are provisional until
 * then: the SQL they spell out may still be rejected.
 */
@Injectable()
export class QueryPipelineService {
  private readonly logger = new Logger(QueryPipelineService.name);

  constructor(
    private readonly retriever: SchemaRetrieverService,
    private readonly generator: SqlGeneratorService,
    private readonly executor: QueryExecutorService,
    private readonly audit: AuditService,
  ) {}

  async *run(request: PipelineRequest, signal?: AbortSignal): AsyncGenerator<PipelineEvent, void, undefined> {
    const { question, namespace, target } = request;
    let state: PipelineState = 'retrieving';
    let sql: string | null = null;
    let result: ExecutionResult | null = null;
    let audited = false;

    // Records the run once its terminal state is known, before the terminal
    // event is handed to the consumer.
    const conclude = (status: RunStatus, error: string | null): void => {
      state = TERMINAL_STATUS[status];
      audited = true;
      const record: AuditRecord = {
        question,
        namespace,
        connectionId: request.connectionId ?? null,
        sql,
        status,
        rowCount: result?.rowCount ?? null,
        execTimeMs: result?.elapsedMs ?? null,
        error,
        finishedAt: new Date(),
      };
      this.audit.dispatch(record);
    };

    try {
      yield statusEvent('Retrieving schema context...');
      const tables = await this.retriever.retrieve(question, namespace);
      signal?.throwIfAborted();

      state = 'generating';
      yield statusEvent('Generating SQL...');
      let candidate = '';
      for await (const chunk of this.generator.stream(question, tables, signal)) {
        candidate += chunk;
        yield { type: 'sql_chunk', chunk };
      }
      sql = candidate.trim();

      state = 'validating';
      yield statusEvent('Validating SQL...');
      const outcome = validateSql(
        sql,
        tables.map((table) => table.tableName),
      );
      if (!outcome.isValid) {
        const hint = outcome.suggestions ? ` (closest allowed: ${outcome.suggestions.join(', ')})` : '';
        this.logger.warn(`Rejected generated SQL (${outcome.rule}): ${outcome.error}${hint}`);
        conclude('validation_error', outcome.error);
        yield errorEvent(outcome.error);
        return;
      }

      state = 'executing';
      yield statusEvent('Executing query...');
      result = await this.executor.execute(target, sql, signal);
      conclude('success', null);

      yield { type: 'results', result };
      yield { type: 'done' };
    } catch (error) {
      const cancelled = signal?.aborted === true;
      const message = cancelled ? 'Query cancelled' : errorMessage(error);
      if (cancelled) {
        this.logger.warn(`Run cancelled while ${state}`);
      } else {
        this.logger.error(`Run failed while ${state}: ${message}`, error instanceof Error ? error.stack : undefined);
      }
      conclude(cancelled ? 'cancelled' : 'error', message);
      yield errorEvent(message);
    } finally {
      // The consumer stopped reading before a terminal state was reached.
      if (!audited) {
        conclude('cancelled', null);
        this.logger.warn('Consumer went away before the run finished');
      }
    }
  }
}
