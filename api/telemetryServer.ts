/**
 * Telemetry API Server - binds the CGI app to a socket and tears it down
 * within a bounded grace period
 */

import * as http from 'http';
import { AddressInfo } from 'net';
import { BindError } from '../common/errors';
import { TelemetrySource } from '../modules/emulator_state';
import { createTelemetryApp } from './app';

export interface TelemetryServerOptions {
  host: string;
  port: number;
  requestTimeoutMs: number;
  shutdownGraceMs: number;
}

export class TelemetryAPIServer {
  private server: http.Server | null = null;

  constructor(
    private readonly source: TelemetrySource,
    private readonly options: TelemetryServerOptions
  ) {}

  /**
   * Listen on host:port. Port 0 picks a free port; read it back from the result.
   */
  start(): Promise<AddressInfo> {
    if (this.server) {
      const bound = this.address();
      if (bound) return Promise.resolve(bound);
    }

    const server = http.createServer(
      {
        requestTimeout: this.options.requestTimeoutMs,
        headersTimeout: Math.min(this.options.requestTimeoutMs, 60_000)
      },
      createTelemetryApp(this.source)
    );

    return new Promise<AddressInfo>((resolve, reject) => {
      const onError = (error: Error) => {
        server.removeListener('listening', onListening);
        reject(new BindError(this.options.port, error));
      };
      const onListening = () => {
        server.removeListener('error', onError);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          server.close();
          reject(new BindError(this.options.port, 'listener has no TCP address'));
          return;
        }
        this.server = server;
        console.log(`📡 Telemetry API listening on http://${address.address}:${address.port}`);
        resolve(address);
      };

      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.options.port, this.options.host);
    });
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== 'string' ? address : null;
  }

  /**
   * Stop accepting connections, let in-flight requests finish for up to
   * graceMs, then drop whatever is left
   */
  async stop(graceMs: number = this.options.shutdownGraceMs): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    server.closeIdleConnections();

    const timer = setTimeout(() => server.closeAllConnections(), Math.max(0, graceMs));
    try {
      await closed;
    } finally {
      clearTimeout(timer);
    }
  }
}
