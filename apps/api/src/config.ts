import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: 'OPENAI_API_KEY is required' }).min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  OPENAI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(512),
  PINECONE_API_KEY: z.string({ required_error: 'PINECONE_API_KEY is required' }).min(1, 'PINECONE_API_KEY is required'),
  PINECONE_INDEX_NAME: z.string().min(1).default('table-embeddings'),
  DATABASE_URL: optionalString,
  QUERY_CONNECTIONS_FILE: optionalString,
  PORT: z.coerce.number().int().positive().default(3000),
});

export interface AppConfig {
  openaiApiKey: string;
  openaiModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  pineconeApiKey: string;
  pineconeIndexName: string;
  databaseUrl?: string;
  connectionsFile?: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    openaiApiKey: vars.OPENAI_API_KEY,
    openaiModel: vars.OPENAI_MODEL,
    embeddingModel: vars.OPENAI_EMBEDDING_MODEL,
    embeddingDimensions: vars.OPENAI_EMBEDDING_DIMENSIONS,
    pineconeApiKey: vars.PINECONE_API_KEY,
    pineconeIndexName: vars.PINECONE_INDEX_NAME,
    databaseUrl: vars.DATABASE_URL,
    connectionsFile: vars.QUERY_CONNECTIONS_FILE,
    port: vars.PORT,
  };
}
