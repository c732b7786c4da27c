import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { collect, FakeChatModel } from '../test/fakes';
import { GenerationError } from './errors';
import { buildPrompt, SqlGeneratorService, SYSTEM_PROMPT } from './sql-generator.service';
import { TableDescription } from './types';

const tables: TableDescription[] = [
  { tableName: 'users', renderedDoc: 'Table: users\nColumns: id, email', relevanceScore: 0.9 },
  { tableName: 'orders', renderedDoc: 'Table: orders', relevanceScore: 0.4 },
];

describe('buildPrompt', () => {
  it('lists the allowed tables before the schema and the question', () => {
    expect(buildPrompt('How many users?', tables)).toBe(
      [
        'Allowed tables (you may ONLY use these): "users", "orders"',
        '',
        'Database schema:',
        'Table: users',
        'Columns: id, email',
        '',
        'Table: orders',
        '',
        'Question: How many users?',
        '',
        'SQL query:',
      ].join('\n'),
    );
  });

  it('says so when no tables were retrieved', () => {
    expect(buildPrompt('Anything?', []).split('\n')[0]).toBe('Allowed tables (you may ONLY use these): (none)');
  });
});

describe('SqlGeneratorService', () => {
  it('streams the non-empty fragments in order', async () => {
    const llm = new FakeChatModel([
      { content: 'SELECT ' },
      { content: '' },
      { content: [{ type: 'text', text: 'COUNT(*) ' }] },
      { content: 'FROM "users"' },
    ]);
    const generator = new SqlGeneratorService(llm);

    const fragments = await collect(generator.stream('How many users?', tables));

    expect(fragments).toEqual(['SELECT ', 'COUNT(*) ', 'FROM "users"']);
  });

  it('sends the system prompt and the rendered question', async () => {
    const llm = new FakeChatModel([{ content: 'SELECT 1' }]);
    const controller = new AbortController();

    await collect(new SqlGeneratorService(llm).stream('How many users?', tables, controller.signal));

    expect(llm.calls).toHaveLength(1);
    const [system, human] = llm.calls[0].input;
    expect(system).toBeInstanceOf(SystemMessage);
    expect(system.content).toBe(SYSTEM_PROMPT);
    expect(human).toBeInstanceOf(HumanMessage);
    expect(human.content).toBe(buildPrompt('How many users?', tables));
    expect(llm.calls[0].signal).toBe(controller.signal);
  });

  it('wraps a failure to start the stream', async () => {
    const llm = new FakeChatModel();
    llm.failure = new Error('401 Unauthorized');

    await expect(collect(new SqlGeneratorService(llm).stream('q', tables))).rejects.toEqual(
      new GenerationError('SQL generation failed: 401 Unauthorized'),
    );
  });

  it('wraps a failure in the middle of the stream after the fragments already sent', async () => {
    const llm = new FakeChatModel([{ content: 'SELECT ' }]);
    llm.streamFailure = new Error('stream reset');
    const received: string[] = [];

    const run = async () => {
      for await (const fragment of new SqlGeneratorService(llm).stream('q', tables)) received.push(fragment);
    };

    await expect(run()).rejects.toBeInstanceOf(GenerationError);
    expect(received).toEqual(['SELECT ']);
  });

  it('closes the model stream when the consumer stops early', async () => {
    const llm = new FakeChatModel([{ content: 'SELECT ' }, { content: '1' }]);

    for await (const fragment of new SqlGeneratorService(llm).stream('q', tables)) {
      expect(fragment).toBe('SELECT ');
      break;
    }

    expect(llm.finished).toBe(true);
  });
});
