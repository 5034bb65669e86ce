import chalk from 'chalk';
import type { Command } from 'commander';

import { parsePort, type DashboardEnv } from '../../config/env-config.js';
import { ensureDashboardDirs, resolveDashboardPaths } from '../../config/dashboard-paths.js';
import type { DashboardServerOptions } from '../../server/dashboard-server.js';
import { errorCode, errorMessage } from '../../utils/error-utils.js';
import { flushProcessLifecycleLogQueue, logProcessLifecycleSync } from '../../utils/process-lifecycle-logger.js';
import type { CliLogger } from '../logger.js';

export type DashboardServerLike = {
  start(): Promise<{ port: number }>;
  stop(): Promise<void>;
};

export type ServeCommandContext = {
  logger: CliLogger;
  log: (line: string) => void;
  env: DashboardEnv;
  createServer: (options: DashboardServerOptions) => DashboardServerLike;
  onSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  exit: (code: number) => never;
};

export function formatBanner(port: number): string[] {
  return [
    '',
    chalk.cyan.bold('☁️  CloudLab Dashboard Server'),
    `${chalk.green('URL:')} http://localhost:${port}`,
    chalk.yellow('Press Ctrl+C to stop'),
    ''
  ];
}

export function createServeCommand(program: Command, ctx: ServeCommandContext): void {
  program
    .command('serve', { isDefault: true })
    .description('Start the dashboard HTTP server')
    .option('-p, --port <port>', 'Port to bind (overrides CLOUDLAB_PORT)')
    .option('--host <host>', 'Host to bind (overrides CLOUDLAB_HOST)')
    .allowExcessArguments(false)
    .action(async (options: { port?: string; host?: string }) => {
      let port = ctx.env.port;
      if (options.port !== undefined) {
        const parsed = parsePort(options.port);
        if (parsed === null) {
          ctx.logger.error(`Invalid port: ${options.port}`);
          ctx.exit(2);
        }
        port = parsed;
      }
      const host = options.host?.trim() || ctx.env.host;
      const paths = resolveDashboardPaths({ rootDir: ctx.env.rootDir });

      let server: DashboardServerLike;
      let boundPort: number;
      try {
        ensureDashboardDirs(paths);
        server = ctx.createServer({ host, port, paths, commandBin: ctx.env.commandBin });
        boundPort = (await server.start()).port;
      } catch (error) {
        if (errorCode(error) === 'EADDRINUSE') {
          ctx.logger.error(`Error: Port ${port} is already in use`);
          ctx.log('Try: cloudlab stop dashboard && cloudlab start dashboard');
        } else {
          ctx.logger.error(`Error: ${errorMessage(error)}`);
        }
        ctx.exit(1);
      }

      for (const line of formatBanner(boundPort)) {
        ctx.log(line);
      }

      let stopping = false;
      const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        if (stopping) {
          return;
        }
        stopping = true;
        ctx.log(chalk.yellow('\nShutting down dashboard server...'));
        logProcessLifecycleSync({ event: 'signal_shutdown', source: 'cli.serve', details: { signal, port: boundPort } });
        try {
          await server.stop();
          await flushProcessLifecycleLogQueue();
        } catch (error) {
          ctx.logger.error(`Shutdown failed: ${errorMessage(error)}`);
          ctx.exit(1);
        }
        ctx.exit(0);
      };
      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        ctx.onSignal(signal, () => {
          shutdown(signal).catch((error: unknown) => {
            ctx.logger.error(`Shutdown failed: ${errorMessage(error)}`);
          });
        });
      }
    });
}
