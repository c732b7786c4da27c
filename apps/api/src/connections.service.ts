import * as fs from 'fs';
import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { z } from 'zod';
import { APP_CONFIG, AppConfig } from './config';
import { TargetDatabase } from './types';

const connectionSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  namespace: z.string().min(1).optional(),
  connectionString: z.string().min(1),
});

const connectionsFileSchema = z.array(connectionSchema);

export type ConnectionEntry = z.infer<typeof connectionSchema>;

export interface ResolvedConnection {
  id: string;
  namespace: string;
  target: TargetDatabase;
}

export function parseConnections(json: unknown): ConnectionEntry[] {
  const parsed = connectionsFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid connections file at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  const seen = new Set<string>();
  for (const entry of parsed.data) {
    if (seen.has(entry.id)) throw new Error(`Duplicate connection id "${entry.id}"`);
    seen.add(entry.id);
  }
  return parsed.data;
}

/**
 * Resolves connection ids to a schema namespace and a target database.
 * Stands in for the connection-management service, which owns storage,
 * encryption and ownership checks.
 */
@Injectable()
export class ConnectionsService {
  private readonly logger = new Logger(ConnectionsService.name);
  private readonly connections = new Map<string, ConnectionEntry>();

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    if (!config.connectionsFile) {
      this.logger.warn('QUERY_CONNECTIONS_FILE is not set, no connections can be resolved');
      return;
    }
    const raw: unknown = JSON.parse(fs.readFileSync(config.connectionsFile, 'utf8'));
    for (const entry of parseConnections(raw)) {
      this.connections.set(entry.id, entry);
    }
    this.logger.log(`Loaded ${this.connections.size} connections from ${config.connectionsFile}`);
  }

  resolve(connectionId: string): ResolvedConnection {
    const entry = this.connections.get(connectionId);
    if (!entry) {
      throw new NotFoundException('Connection not found');
    }
    if (!entry.namespace) {
      throw new BadRequestException('Schema not indexed yet. Please index the connection first.');
    }
    return {
      id: entry.id,
      namespace: entry.namespace,
      target: { connectionString: entry.connectionString },
    };
  }
}
