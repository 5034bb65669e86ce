import express, { type Application } from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import type { DashboardPaths } from '../config/dashboard-paths.js';
import { runManagementCommand } from '../status/command-bridge.js';
import { createDefaultStatusAggregator, type StatusAggregator } from '../status/status-aggregator.js';
import { logProcessLifecycle } from '../utils/process-lifecycle-logger.js';
import { getAppVersion } from '../utils/version.js';
import { registerDefaultMiddleware } from './middleware.js';
import { registerDashboardRoutes } from './routes.js';

export type DashboardServerOptions = {
  host: string;
  port: number;
  paths: DashboardPaths;
  commandBin: string;
  aggregator?: StatusAggregator;
  commandTimeoutMs?: number;
  log?: (line: string) => void;
};

export class DashboardHttpServer {
  private readonly app: Application;
  private readonly log: (line: string) => void;
  private server: Server | null = null;

  constructor(private readonly options: DashboardServerOptions) {
    this.log = options.log ?? ((line: string) => console.log(line));
    this.app = express();
    registerDefaultMiddleware(this.app);
    registerDashboardRoutes({
      app: this.app,
      paths: options.paths,
      aggregator:
        options.aggregator ?? createDefaultStatusAggregator({ paths: options.paths, commandBin: options.commandBin }),
      commandBin: options.commandBin,
      runCommand: (argv) =>
        runManagementCommand(argv, { executable: options.commandBin, timeoutMs: options.commandTimeoutMs }),
      getVersion: getAppVersion
    });
  }

  /** Resolves with the bound address (port 0 binds an ephemeral port). */
  public async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Dashboard server already started');
    }
    const server = await new Promise<Server>((resolve, reject) => {
      const candidate = this.app.listen(this.options.port, this.options.host);
      const onError = (error: Error): void => reject(error);
      candidate.once('error', onError);
      candidate.once('listening', () => {
        candidate.off('error', onError);
        resolve(candidate);
      });
    });
    this.server = server;
    const address = this.getAddress();
    if (!address) {
      throw new Error('Dashboard server is listening without a TCP address');
    }
    this.log(`[DashboardServer] Listening on ${address.address}:${address.port}`);
    logProcessLifecycle({
      event: 'server_listen',
      source: 'server.dashboard',
      details: { port: address.port, host: address.address, result: 'success' }
    });
    return address;
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    this.log('[DashboardServer] Server stopped');
    logProcessLifecycle({ event: 'server_stop', source: 'server.dashboard', details: { result: 'success' } });
  }

  public getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  public isRunning(): boolean {
    return this.server !== null;
  }
}
