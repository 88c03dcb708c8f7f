/**
 * Shared test helpers
 */

import type { ResponseWriter } from '../context';
import { Logger } from '../logging';

export interface RecordedResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * In-process ResponseWriter that keeps every write
 */
export class RecordingWriter implements ResponseWriter {
  readonly writes: RecordedResponse[] = [];

  write(status: number, headers: Record<string, string>, body: Buffer): void {
    this.writes.push({ status, headers, body });
  }

  get last(): RecordedResponse {
    const last = this.writes[this.writes.length - 1];
    if (!last) {
      throw new Error('Nothing was written');
    }
    return last;
  }

  get text(): string {
    return this.last.body.toString('utf8');
  }
}

export function createSink() {
  return {
    debug: jest.fn(),
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export function silentLogger(level: 'debug' | 'info' = 'info') {
  const sink = createSink();
  return { sink, logger: new Logger({ level, sink }) };
}
