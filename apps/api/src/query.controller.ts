import { BadRequestException, Body, Controller, Logger, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { ConnectionsService } from './connections.service';
import { formatSse, isTerminal } from './pipeline-events';
import { parseQueryRequest } from './query.dto';
import { QueryPipelineService } from './query-pipeline.service';

@Controller('api/query')
export class QueryController {
  private readonly logger = new Logger(QueryController.name);

  constructor(
    private readonly pipeline: QueryPipelineService,
    private readonly connections: ConnectionsService,
  ) {}

  /**
   * Streams pipeline events as Server-Sent Events. Request problems are
   * plain HTTP errors; once the stream has started every failure arrives
   * as an `error` event.
   */
  @Post()
  async handle(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const request = parseQueryRequest(body);
    if (!request.ok) {
      throw new BadRequestException(request.message);
    }
    const { question, connectionId } = request.value;
    const connection = this.connections.resolve(connectionId);

    res.status(200).set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        this.logger.warn(`Client disconnected from query on connection "${connectionId}"`);
        abort.abort();
      }
    });

    const events = this.pipeline.run(
      { question, namespace: connection.namespace, target: connection.target, connectionId: connection.id },
      abort.signal,
    );
    for await (const event of events) {
      if (abort.signal.aborted) break;
      res.write(formatSse(event));
      if (isTerminal(event)) break;
    }
    res.end();
  }
}
