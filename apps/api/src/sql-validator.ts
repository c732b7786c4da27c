import fuzzysort from 'fuzzysort';
import {
  extractTableReferences,
  leadingKeyword,
  splitStatements,
  SqlLexError,
  SqlToken,
  tokenize,
} from './sql-lexer';
import { ValidationOutcome, ValidationRule } from './types';

/** Prefix the model is told to use when it cannot answer from the given tables. */
export const REFUSAL_PREFIX = '-- Cannot answer:';

const REFUSAL_PATTERN = /^--\s*cannot answer\b\s*:?\s*(.*)$/i;

export const FORBIDDEN_KEYWORDS = [
  'DROP',
  'DELETE',
  'INSERT',
  'UPDATE',
  'ALTER',
  'TRUNCATE',
  'CREATE',
  'REPLACE',
  'MERGE',
  'GRANT',
  'REVOKE',
  'EXEC',
  'EXECUTE',
  'CALL',
  'COPY',
  'VACUUM',
  'ANALYZE',
] as const;

// Word boundaries keep identifiers such as deleted_at or "updated" from matching.
const FORBIDDEN_PATTERN = new RegExp(`\\b(${FORBIDDEN_KEYWORDS.join('|')})\\b`, 'i');

function reject(rule: ValidationRule, error: string, suggestions: string[] = []): ValidationOutcome {
  if (suggestions.length === 0) return { isValid: false, rule, error };
  return { isValid: false, rule, error, suggestions };
}

/**
 * Decides whether a generated statement may run against a user's database.
 * Checks run in a fixed order and the first failure wins.
 *
 * @param knownTables allow-list of table names; when given (even empty),
 *   every table the query reads from must be in it.
 */
export function validateSql(sql: string, knownTables?: Iterable<string>): ValidationOutcome {
  const trimmed = sql.trim();
  if (!trimmed) {
    return reject('empty', 'Empty SQL query');
  }

  const refusal = REFUSAL_PATTERN.exec(trimmed.split(/\r?\n/, 1)[0]);
  if (refusal) {
    const reason = refusal[1].trim() || 'no reason given';
    return reject('refusal', `The model could not generate a query for that question: ${reason}`);
  }

  const forbidden = FORBIDDEN_PATTERN.exec(trimmed);
  if (forbidden) {
    return reject(
      'forbidden_keyword',
      `Forbidden keyword detected: ${forbidden[1].toUpperCase()}. Only SELECT queries are allowed.`,
    );
  }

  let statements: SqlToken[][];
  try {
    statements = splitStatements(tokenize(trimmed));
  } catch (error) {
    if (error instanceof SqlLexError) {
      return reject('parse_error', `Could not parse SQL: ${error.message}`);
    }
    throw error;
  }

  if (statements.length === 0) {
    return reject('parse_error', 'Could not parse SQL');
  }
  if (statements.length > 1) {
    return reject('multiple_statements', 'Multiple statements are not allowed');
  }

  const [statement] = statements;
  const keyword = leadingKeyword(statement);
  if (keyword !== 'SELECT') {
    return reject('not_select', `Only SELECT statements are allowed. Got: ${keyword ?? 'unknown'}`);
  }

  if (knownTables !== undefined) {
    const allowed = [...knownTables];
    const allowedLower = new Set(allowed.map((name) => name.toLowerCase()));
    const unknown = extractTableReferences(statement)
      .filter((name) => !allowedLower.has(name))
      .sort();

    if (unknown.length > 0) {
      return reject(
        'unknown_tables',
        `Query references unknown table(s): ${unknown.join(', ')}`,
        suggestTables(unknown, allowed),
      );
    }
  }

  return { isValid: true };
}

// Closest allow-list name for each unknown table, deduplicated.
function suggestTables(unknown: string[], allowed: string[]): string[] {
  const suggestions = new Set<string>();
  for (const name of unknown) {
    const [best] = fuzzysort.go(name, allowed, { limit: 1 });
    if (best) suggestions.add(best.target);
  }
  return [...suggestions];
}
