import { PipelineEvent } from './types';

export type WireEvent =
  | { type: 'status'; message: string }
  | { type: 'sql_chunk'; chunk: string }
  | { type: 'results'; columns: string[]; rows: unknown[][]; exec_time_ms: number; row_count: number }
  | { type: 'done' }
  | { type: 'error'; message: string };

export function statusEvent(message: string): PipelineEvent {
  return { type: 'status', message };
}

export function errorEvent(message: string): PipelineEvent {
  return { type: 'error', message };
}

export function isTerminal(event: PipelineEvent): boolean {
  return event.type === 'done' || event.type === 'error';
}

export function toWireEvent(event: PipelineEvent): WireEvent {
  switch (event.type) {
    case 'results':
      return {
        type: 'results',
        columns: event.result.columns,
        rows: event.result.rows,
        exec_time_ms: event.result.elapsedMs,
        row_count: event.result.rowCount,
      };
    case 'status':
    case 'sql_chunk':
    case 'done':
    case 'error':
      return event;
  }
}

/** One Server-Sent Events frame. */
export function formatSse(event: PipelineEvent): string {
  return `data: ${JSON.stringify(toWireEvent(event))}\n\n`;
}
