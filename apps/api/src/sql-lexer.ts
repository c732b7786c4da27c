/**
 * Minimal PostgreSQL lexer used by the SQL validator.
 *
 * It understands just enough of the dialect to split statements and find
 * keywords without being fooled by string literals, quoted identifiers,
 * dollar quoting or comments. It does not build an AST.
 */

export type SqlTokenKind = 'word' | 'quoted' | 'string' | 'number' | 'param' | 'punct' | 'operator';

export interface SqlToken {
  kind: SqlTokenKind;
  value: string;
  offset: number;
}

export class SqlLexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SqlLexError';
  }
}

const WORD_START = /[\p{L}_]/u;
const WORD_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;
const PUNCTUATION = '(),;[].';
const OPERATOR_CHARS = '+-*/<>=~!@#%^&|`?:';
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;
const POSITIONAL_PARAM = /^\$\d+/;

export function tokenize(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  const length = sql.length;
  let i = 0;

  while (i < length) {
    const ch = sql[i];
    const next = sql[i + 1] ?? '';

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', i);
      i = newline === -1 ? length : newline + 1;
      continue;
    }

    if (ch === '/' && next === '*') {
      i = skipBlockComment(sql, i);
      continue;
    }

    if (ch === "'") {
      const end = readQuoted(sql, i, "'", false, 'unterminated string literal');
      tokens.push({ kind: 'string', value: unescapeDoubled(sql.slice(i + 1, end - 1), "'"), offset: i });
      i = end;
      continue;
    }

    if ((ch === 'E' || ch === 'e') && next === "'") {
      const end = readQuoted(sql, i + 1, "'", true, 'unterminated string literal');
      tokens.push({ kind: 'string', value: sql.slice(i + 2, end - 1), offset: i });
      i = end;
      continue;
    }

    if (ch === '"') {
      const end = readQuoted(sql, i, '"', false, 'unterminated quoted identifier');
      tokens.push({ kind: 'quoted', value: unescapeDoubled(sql.slice(i + 1, end - 1), '"'), offset: i });
      i = end;
      continue;
    }

    if (ch === '$') {
      const rest = sql.slice(i);
      const tag = DOLLAR_TAG.exec(rest);
      if (tag) {
        const delimiter = tag[0];
        const close = sql.indexOf(delimiter, i + delimiter.length);
        if (close === -1) throw new SqlLexError('unterminated dollar-quoted string');
        tokens.push({ kind: 'string', value: sql.slice(i + delimiter.length, close), offset: i });
        i = close + delimiter.length;
        continue;
      }
      const param = POSITIONAL_PARAM.exec(rest);
      if (param) {
        tokens.push({ kind: 'param', value: param[0], offset: i });
        i += param[0].length;
        continue;
      }
    }

    if (DIGIT.test(ch) || (ch === '.' && DIGIT.test(next))) {
      let end = i + 1;
      while (end < length && /[0-9.eE_]/.test(sql[end])) {
        if ((sql[end] === 'e' || sql[end] === 'E') && (sql[end + 1] === '+' || sql[end + 1] === '-')) end++;
        end++;
      }
      tokens.push({ kind: 'number', value: sql.slice(i, end), offset: i });
      i = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < length && WORD_PART.test(sql[end])) end++;
      tokens.push({ kind: 'word', value: sql.slice(i, end), offset: i });
      i = end;
      continue;
    }

    if (PUNCTUATION.includes(ch)) {
      tokens.push({ kind: 'punct', value: ch, offset: i });
      i++;
      continue;
    }

    let end = i + 1;
    if (OPERATOR_CHARS.includes(ch)) {
      while (
        end < length &&
        OPERATOR_CHARS.includes(sql[end]) &&
        !startsComment(sql, end)
      ) {
        end++;
      }
    }
    tokens.push({ kind: 'operator', value: sql.slice(i, end), offset: i });
    i = end;
  }

  return tokens;
}

function startsComment(sql: string, at: number): boolean {
  const pair = sql.slice(at, at + 2);
  return pair === '--' || pair === '/*';
}

// PostgreSQL block comments nest.
function skipBlockComment(sql: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < sql.length) {
    const pair = sql.slice(i, i + 2);
    if (pair === '/*') {
      depth++;
      i += 2;
    } else if (pair === '*/') {
      depth--;
      i += 2;
      if (depth === 0) return i;
    } else {
      i++;
    }
  }
  throw new SqlLexError('unterminated block comment');
}

/** Returns the index just past the closing quote. */
function readQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean, failure: string): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (backslashEscapes && ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  throw new SqlLexError(failure);
}

function unescapeDoubled(value: string, quote: string): string {
  return value.split(quote + quote).join(quote);
}

export function splitStatements(tokens: SqlToken[]): SqlToken[][] {
  const statements: SqlToken[][] = [];
  let current: SqlToken[] = [];
  for (const token of tokens) {
    if (token.kind === 'punct' && token.value === ';') {
      if (current.length > 0) statements.push(current);
      current = [];
      continue;
    }
    current.push(token);
  }
  if (current.length > 0) statements.push(current);
  return statements;
}

/** First bare word of a statement, upper-cased. */
export function leadingKeyword(statement: SqlToken[]): string | undefined {
  const word = statement.find((token) => token.kind === 'word');
  return word?.value.toUpperCase();
}

// Functions whose argument syntax uses FROM, e.g. EXTRACT(YEAR FROM d).
const FROM_ARGUMENT_FUNCTIONS = new Set(['EXTRACT', 'OVERLAY', 'POSITION', 'SUBSTRING', 'TRIM']);
const SUBQUERY_STARTERS = new Set(['SELECT', 'TABLE', 'VALUES', 'WITH']);

// Words that end a FROM item, so they are never read as an alias.
const CLAUSE_KEYWORDS = new Set([
  'CROSS', 'EXCEPT', 'FETCH', 'FOR', 'FULL', 'GROUP', 'HAVING', 'INNER', 'INTERSECT', 'JOIN', 'LEFT',
  'LIMIT', 'NATURAL', 'OFFSET', 'ON', 'ORDER', 'OUTER', 'RETURNING', 'RIGHT', 'TABLESAMPLE', 'UNION',
  'USING', 'WHERE', 'WINDOW',
]);

const REFERENCE_MODIFIERS = new Set(['ONLY', 'LATERAL']);
const ALIAS_KEYWORD = new Set(['AS']);
const RELATION_KEYWORDS = new Set(['FROM', 'JOIN']);

function isPunct(token: SqlToken | undefined, value: string): boolean {
  return token !== undefined && token.kind === 'punct' && token.value === value;
}

function isWord(token: SqlToken | undefined, words?: Set<string>): boolean {
  if (token === undefined || token.kind !== 'word') return false;
  return words === undefined || words.has(token.value.toUpperCase());
}

function isIdentifier(token: SqlToken | undefined): token is SqlToken {
  if (token === undefined) return false;
  if (token.kind === 'quoted') return true;
  return token.kind === 'word' && !CLAUSE_KEYWORDS.has(token.value.toUpperCase());
}

/**
 * A "(" only hides the FROMs directly inside it when it holds the arguments
 * of a FROM-taking function. Anything that starts a subquery is a group,
 * whatever precedes it (LIMIT (SELECT ...), SIMILAR TO (SELECT ...)).
 */
function frameKind(previous: SqlToken | undefined, next: SqlToken | undefined): 'call' | 'group' {
  if (isWord(next, SUBQUERY_STARTERS)) return 'group';
  return isWord(previous, FROM_ARGUMENT_FUNCTIONS) ? 'call' : 'group';
}

function skipParens(tokens: SqlToken[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isPunct(tokens[i], '(')) depth++;
    else if (isPunct(tokens[i], ')')) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return tokens.length;
}

function readReference(tokens: SqlToken[], start: number): { name?: string; end: number } {
  let i = start;
  while (isWord(tokens[i], REFERENCE_MODIFIERS)) i++;

  const first = tokens[i];
  if (isPunct(first, '(')) return { end: skipParens(tokens, i) };
  if (!isIdentifier(first)) return { end: i };

  const parts = [first.value];
  i++;
  while (isPunct(tokens[i], '.') && isIdentifier(tokens[i + 1])) {
    parts.push(tokens[i + 1].value);
    i += 2;
  }
  // Set-returning function, e.g. generate_series(1, 10).
  if (isPunct(tokens[i], '(')) return { end: skipParens(tokens, i) };

  return { name: parts[parts.length - 1].toLowerCase(), end: i };
}

function skipAlias(tokens: SqlToken[], start: number): number {
  let i = start;
  if (isWord(tokens[i], ALIAS_KEYWORD)) {
    i++;
    if (isIdentifier(tokens[i])) i++;
  } else if (isIdentifier(tokens[i])) {
    i++;
  }
  if (isPunct(tokens[i], '(')) i = skipParens(tokens, i);
  return i;
}

/**
 * Bare, lower-cased names of the relations a statement reads from: the item
 * after each FROM / JOIN plus the rest of a comma-separated FROM list.
 * Schema qualifiers and quoting are dropped. FROM in the arguments of
 * EXTRACT, SUBSTRING, TRIM, OVERLAY and POSITION is ignored; every other
 * FROM counts, at any nesting depth.
 *
 * Lexical heuristic, not a resolver: CTE names and subquery aliases are not
 * tracked.
 */
export function extractTableReferences(statement: SqlToken[]): string[] {
  const found = new Set<string>();
  const frames: Array<'call' | 'group'> = [];

  for (let i = 0; i < statement.length; i++) {
    const token = statement[i];
    if (isPunct(token, '(')) {
      frames.push(frameKind(statement[i - 1], statement[i + 1]));
      continue;
    }
    if (isPunct(token, ')')) {
      frames.pop();
      continue;
    }
    if (frames[frames.length - 1] === 'call') continue;
    if (!isWord(token, RELATION_KEYWORDS)) continue;

    const listContinues = token.value.toUpperCase() === 'FROM';
    let cursor = i + 1;
    for (;;) {
      const reference = readReference(statement, cursor);
      if (reference.name !== undefined) found.add(reference.name);
      if (!listContinues) break;
      cursor = skipAlias(statement, reference.end);
      if (!isPunct(statement[cursor], ',')) break;
      cursor++;
    }
  }

  return [...found];
}
