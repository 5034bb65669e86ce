import { Command } from 'commander';

import { resolveDashboardPaths } from '../config/dashboard-paths.js';
import type { DashboardEnv } from '../config/env-config.js';
import { DashboardHttpServer, type DashboardServerOptions } from '../server/dashboard-server.js';
import { runManagementCommand, type CommandRunResult } from '../status/command-bridge.js';
import { createDefaultStatusAggregator, type StatusAggregator } from '../status/status-aggregator.js';
import { createEnvsCommand } from './commands/envs.js';
import { createLogsCommand } from './commands/logs.js';
import { createRunCommand } from './commands/run.js';
import { createServeCommand, type DashboardServerLike } from './commands/serve.js';
import { createStatusCommand } from './commands/status.js';
import { chalkPainter, logger as defaultLogger, type CliLogger, type Painter } from './logger.js';
import type { CliRuntime } from './runtime.js';
import { createSpinner as defaultCreateSpinner, type Spinner } from './spinner.js';

export const CLI_NAME = 'cloudlab-dashboard';

export type CliProgramContext = {
  cliVersion: string;
  runtime: CliRuntime;
  env: DashboardEnv;
  logger?: CliLogger;
  painter?: Painter;
  createServer?: (options: DashboardServerOptions) => DashboardServerLike;
  createAggregator?: () => StatusAggregator;
  createSpinner?: (text: string) => Spinner;
  runCommand?: (argv: readonly string[]) => Promise<CommandRunResult>;
  onSignal?: (signal: NodeJS.Signals, handler: () => void) => void;
  exit?: (code: number) => never;
};

export function createCliProgram(ctx: CliProgramContext): Command {
  const program = new Command();
  const logger = ctx.logger ?? defaultLogger;
  const log = (line: string): void => ctx.runtime.writeOut(`${line}\n`);
  const exit = ctx.exit ?? ((code: number) => process.exit(code));
  const paths = resolveDashboardPaths({ rootDir: ctx.env.rootDir });

  program.configureOutput({
    writeOut: (str) => ctx.runtime.writeOut(str),
    writeErr: (str) => ctx.runtime.writeErr(str)
  });

  // Set before subcommands are added so they inherit it.
  program.exitOverride();
  program.enablePositionalOptions();

  program
    .name(CLI_NAME)
    .description('CloudLab Dashboard - service status, logs and management bridge')
    .version(ctx.cliVersion);

  createServeCommand(program, {
    logger,
    log,
    env: ctx.env,
    createServer: ctx.createServer ?? ((options) => new DashboardHttpServer(options)),
    onSignal:
      ctx.onSignal ??
      ((signal, handler) => {
        process.on(signal, handler);
      }),
    exit
  });

  createStatusCommand(program, {
    logger,
    log,
    painter: ctx.painter ?? chalkPainter,
    createSpinner: ctx.createSpinner ?? ((text) => defaultCreateSpinner(text, { interactive: ctx.runtime.interactive })),
    createAggregator:
      ctx.createAggregator ?? (() => createDefaultStatusAggregator({ paths, commandBin: ctx.env.commandBin }))
  });

  createLogsCommand(program, { logger, log, paths, exit });
  createEnvsCommand(program, { logger, log, paths });

  createRunCommand(program, {
    logger,
    writeOut: (text) => ctx.runtime.writeOut(text),
    writeErr: (text) => ctx.runtime.writeErr(text),
    commandBin: ctx.env.commandBin,
    runCommand: ctx.runCommand ?? ((argv) => runManagementCommand(argv, { executable: ctx.env.commandBin })),
    exit
  });

  return program;
}
