import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage, RetrievalError } from './errors';
import { VECTOR_INDEX, VectorIndex } from './pinecone.service';
import { TableDescription, TableMatch } from './types';

export const EMBEDDINGS = Symbol('EMBEDDINGS');

export const TOP_K = 6;

export interface EmbeddingClient {
  embedQuery(text: string): Promise<number[]>;
}

@Injectable()
export class SchemaRetrieverService {
  private readonly logger = new Logger(SchemaRetrieverService.name);

  constructor(
    @Inject(EMBEDDINGS) private readonly embeddings: EmbeddingClient,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
  ) {}

  /**
   * Top-K table descriptions for a question, most relevant first.
   * Any embedding or index failure is fatal: the caller never gets a
   * partial context.
   */
  async retrieve(question: string, namespace: string): Promise<TableDescription[]> {
    let vector: number[];
    try {
      vector = await this.embeddings.embedQuery(question);
    } catch (error) {
      throw new RetrievalError(`Failed to embed the question: ${errorMessage(error)}`, { cause: error });
    }

    let matches: TableMatch[];
    try {
      matches = await this.index.queryTables(vector, TOP_K, namespace);
    } catch (error) {
      throw new RetrievalError(`Failed to query the schema index: ${errorMessage(error)}`, { cause: error });
    }

    const tables: TableDescription[] = [];
    for (const match of matches) {
      const tableName = match.metadata.tableName;
      if (!tableName) continue;
      tables.push({
        tableName,
        renderedDoc: match.metadata.doc ?? `Table: ${tableName}`,
        relevanceScore: match.score,
      });
    }

    tables.sort((a, b) => b.relevanceScore - a.relevanceScore);
    const top = tables.slice(0, TOP_K);
    this.logger.log(`Retrieved ${top.length} tables for namespace "${namespace}": ${top.map((t) => t.tableName).join(', ')}`);
    return top;
  }
}
