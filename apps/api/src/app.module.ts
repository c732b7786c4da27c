import { Module } from '@nestjs/common';
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import { Pinecone } from '@pinecone-database/pinecone';
import { AUDIT_STORE, AuditStore, LogAuditStore, PgAuditStore } from './audit-store';
import { AuditService } from './audit.service';
import { APP_CONFIG, AppConfig, loadConfig } from './config';
import { ConnectionsService } from './connections.service';
import { PINECONE_CLIENT, PineconeService, VECTOR_INDEX } from './pinecone.service';
import { QueryController } from './query.controller';
import { QueryExecutorService } from './query-executor.service';
import { QueryPipelineService } from './query-pipeline.service';
import { EMBEDDINGS, EmbeddingClient, SchemaRetrieverService } from './schema-retriever.service';
import { PgSqlDriver, SQL_DRIVER } from './sql-driver';
import { CHAT_MODEL, ChatModelClient, SqlGeneratorService } from './sql-generator.service';

@Module({
  controllers: [QueryController],
  providers: [
    { provide: APP_CONFIG, useFactory: (): AppConfig => loadConfig() },
    {
      provide: CHAT_MODEL,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): ChatModelClient =>
        new ChatOpenAI({
          apiKey: config.openaiApiKey,
          model: config.openaiModel,
          temperature: 0.1,
          maxTokens: 1024,
        }),
    },
    {
      provide: EMBEDDINGS,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): EmbeddingClient =>
        new OpenAIEmbeddings({
          apiKey: config.openaiApiKey,
          model: config.embeddingModel,
          dimensions: config.embeddingDimensions,
        }),
    },
    {
      provide: PINECONE_CLIENT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): Pinecone => new Pinecone({ apiKey: config.pineconeApiKey }),
    },
    {
      provide: AUDIT_STORE,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): AuditStore =>
        config.databaseUrl ? new PgAuditStore(config.databaseUrl) : new LogAuditStore(),
    },
    { provide: SQL_DRIVER, useClass: PgSqlDriver },
    PineconeService,
    { provide: VECTOR_INDEX, useExisting: PineconeService },
    SchemaRetrieverService,
    SqlGeneratorService,
    QueryExecutorService,
    AuditService,
    QueryPipelineService,
    ConnectionsService,
  ],
})
export class AppModule {}
