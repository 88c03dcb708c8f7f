/**
 * HTTP Server
 *
 * http.Server wrapper with start/stop lifecycle around a request listener.
 */

import http from 'http';
import type { AddressInfo } from 'net';
import type { RequestListener } from './node-adapter';

export interface HTTPServerConfig {
  host: string;
  port: number;
}

export interface StopOptions {
  /** Wait for open requests (default true) */
  graceful?: boolean;

  /** Force-close connections after this many ms (default 10000) */
  timeout?: number;
}

export class HTTPServer {
  private server: http.Server | null = null;

  constructor(
    private readonly config: HTTPServerConfig,
    private readonly listener: RequestListener
  ) {}

  /**
   * Start server
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Server already running');
    }

    const server = http.createServer((req, res) => {
      this.listener(req, res).catch((error: unknown) => {
        res.destroy(error instanceof Error ? error : undefined);
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  }

  /**
   * Stop server
   */
  async stop(options: StopOptions = {}): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    const graceful = options.graceful ?? true;
    const timeout = options.timeout ?? 10_000;

    if (!graceful) {
      server.closeAllConnections();
    }

    await new Promise<void>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        server.closeAllConnections();
      }, timeout);

      server.close((err) => {
        clearTimeout(timeoutId);
        this.server = null;
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Check if server is running
   */
  isRunning(): boolean {
    return this.server !== null && this.server.listening;
  }

  /**
   * Get server address
   */
  getAddress(): { host: string; port: number } | null {
    if (!this.server || !this.server.listening) {
      return null;
    }

    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      return null;
    }

    const info: AddressInfo = address;
    return { host: info.address, port: info.port };
  }
}

/**
 * Factory function
 */
export function createHTTPServer(config: HTTPServerConfig, listener: RequestListener): HTTPServer {
  return new HTTPServer(config, listener);
}
