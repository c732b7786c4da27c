export interface TableDescription {
  tableName: string;
  renderedDoc: string;
  relevanceScore: number;
}

export interface TableMatch {
  id: string;
  score: number;
  metadata: {
    tableName?: string;
    doc?: string;
  };
}

export type ValidationRule =
  | 'empty'
  | 'refusal'
  | 'forbidden_keyword'
  | 'parse_error'
  | 'multiple_statements'
  | 'not_select'
  | 'unknown_tables';

export type ValidationOutcome =
  | { isValid: true }
  | {
      isValid: false;
      error: string;
      rule: ValidationRule;
      /** Allow-list names close to the unknown tables. Never part of `error`. */
      suggestions?: string[];
    };

export interface ExecutionResult {
  columns: string[];
  rows: unknown[][];
  elapsedMs: number;
  rowCount: number;
}

/** Resolved handle for a user's database. Never pooled. */
export interface TargetDatabase {
  connectionString: string;
}

export type PipelineEvent =
  | { type: 'status'; message: string }
  | { type: 'sql_chunk'; chunk: string }
  | { type: 'results'; result: ExecutionResult }
  | { type: 'done' }
  | { type: 'error'; message: string };

export type PipelineState =
  | 'retrieving'
  | 'generating'
  | 'validating'
  | 'executing'
  | 'succeeded'
  | 'validation_rejected'
  | 'failed'
  | 'cancelled';

export interface PipelineRequest {
  question: string;
  namespace: string;
  target: TargetDatabase;
  connectionId?: string;
}

export type RunStatus = 'success' | 'validation_error' | 'error' | 'cancelled';

export interface AuditRecord {
  question: string;
  namespace: string;
  connectionId: string | null;
  sql: string | null;
  status: RunStatus;
  rowCount: number | null;
  execTimeMs: number | null;
  error: string | null;
  finishedAt: Date;
}
