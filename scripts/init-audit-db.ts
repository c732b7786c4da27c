import 'dotenv/config';
import * as fs from 'fs';
import { Client } from 'pg';

const schemaPath = process.env.QUERY_LOGS_SCHEMA || './db/query_logs.sql';

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to initialise the audit database');
  }

  const client = new Client({ connectionString });
  await client.connect();
  try {
    const schema = fs.readFileSync(schemaPath, 'utf8');
    await client.query(schema);
    console.log(`Audit schema applied from: ${schemaPath}`);

    const { rows } = await client.query<{ count: string }>('SELECT COUNT(*) AS count FROM query_logs');
    console.log(`query_logs rows: ${rows[0]?.count ?? '0'}`);
  } finally {
    await client.end();
  }
}

main().catch((error: unknown) => {
  console.error('Error initialising audit database:', error);
  process.exit(1);
});
