import { Inject, Injectable, Logger } from '@nestjs/common';
import { BaseMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import { errorMessage, GenerationError } from './errors';
import { REFUSAL_PREFIX } from './sql-validator';
import { TableDescription } from './types';

export const CHAT_MODEL = Symbol('CHAT_MODEL');

export interface ChatChunk {
  content: unknown;
}

/** The slice of a LangChain chat model the generator needs. */
export interface ChatModelClient {
  stream(input: BaseMessage[], options?: { signal?: AbortSignal }): Promise<AsyncIterable<ChatChunk>>;
}

export const SYSTEM_PROMPT = `You are an expert PostgreSQL query writer.

Rules you MUST follow:
1. Return ONLY the raw SQL query. No markdown, no code fences, no explanation, no text before or after.
2. Return exactly ONE statement, and it must be a read-only SELECT. Never use INSERT, UPDATE, DELETE, DROP, ALTER, TRUNCATE, CREATE, GRANT or any other DDL/DML.
3. You may ONLY reference tables listed under "Allowed tables". The list is closed: never infer, guess or join any other table, even if a column name suggests one exists.
4. If the question cannot be answered using ONLY the allowed tables and their columns, return a single line: ${REFUSAL_PREFIX} <reason>
5. Always wrap every table name and every column name in double quotes (e.g. "users", "createdAt").
6. Use explicit JOIN ... ON clauses based on the foreign keys in the schema, and qualify every column with its table or alias when more than one table is involved.
7. If you give a table an alias (e.g. "orders" AS "o"), use that alias for every column of that table.
8. Add LIMIT 500 when the query could return many rows.`;

export function buildPrompt(question: string, tables: TableDescription[]): string {
  const allowed = tables.map((table) => `"${table.tableName}"`).join(', ');
  const schema = tables.map((table) => table.renderedDoc).join('\n\n');
  return [
    `Allowed tables (you may ONLY use these): ${allowed || '(none)'}`,
    '',
    `Database schema:\n${schema}`,
    '',
    `Question: ${question}`,
    '',
    'SQL query:',
  ].join('\n');
}

function chunkText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  let text = '';
  for (const part of content) {
    if (typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string') {
      text += part.text;
    }
  }
  return text;
}

@Injectable()
export class SqlGeneratorService {
  private readonly logger = new Logger(SqlGeneratorService.name);

  constructor(@Inject(CHAT_MODEL) private readonly llm: ChatModelClient) {}

  /**
   * Streams one SQL candidate as text fragments. Fragment boundaries are
   * whatever the model sends; only their order is meaningful.
   */
  async *stream(
    question: string,
    tables: TableDescription[],
    signal?: AbortSignal,
  ): AsyncGenerator<string, void, undefined> {
    const messages = [new SystemMessage(SYSTEM_PROMPT), new HumanMessage(buildPrompt(question, tables))];

    let fragments: AsyncIterable<ChatChunk>;
    try {
      fragments = await this.llm.stream(messages, { signal });
    } catch (error) {
      throw new GenerationError(`SQL generation failed: ${errorMessage(error)}`, { cause: error });
    }

    let emitted = 0;
    try {
      for await (const chunk of fragments) {
        const text = chunkText(chunk.content);
        if (!text) continue;
        emitted++;
        yield text;
      }
    } catch (error) {
      throw new GenerationError(`SQL generation failed: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.log(`Generated SQL in ${emitted} fragments`);
  }
}
