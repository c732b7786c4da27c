import { Inject, Injectable, Logger } from '@nestjs/common';
import { Pinecone, RecordMetadata } from '@pinecone-database/pinecone';
import { APP_CONFIG, AppConfig } from './config';
import { TableMatch } from './types';

export const PINECONE_CLIENT = Symbol('PINECONE_CLIENT');
export const VECTOR_INDEX = Symbol('VECTOR_INDEX');

/** Read side of the schema index. Writes belong to the indexing job. */
export interface VectorIndex {
  queryTables(vector: number[], topK: number, namespace: string): Promise<TableMatch[]>;
}

function metadataString(metadata: RecordMetadata | undefined, key: string): string | undefined {
  const value = metadata?.[key];
  return typeof value === 'string' ? value : undefined;
}

@Injectable()
export class PineconeService implements VectorIndex {
  private readonly logger = new Logger(PineconeService.name);
  private readonly indexName: string;

  constructor(
    @Inject(PINECONE_CLIENT) private readonly pinecone: Pinecone,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.indexName = config.pineconeIndexName;
  }

  async queryTables(vector: number[], topK: number, namespace: string): Promise<TableMatch[]> {
    const index = this.pinecone.index(this.indexName).namespace(namespace);

    const searchResponse = await index.query({
      vector,
      topK,
      includeMetadata: true,
    });

    const matches = searchResponse.matches ?? [];
    this.logger.log(`Found ${matches.length} table matches in namespace "${namespace}"`);

    return matches.map((match) => ({
      id: match.id,
      score: match.score ?? 0,
      metadata: {
        tableName: metadataString(match.metadata, 'tableName'),
        doc: metadataString(match.metadata, 'doc'),
      },
    }));
  }
}
