import type { Command } from 'commander';

import type { DashboardPaths } from '../../config/dashboard-paths.js';
import { LOG_TAIL } from '../../constants/index.js';
import { tailServiceLog } from '../../status/log-tail.js';
import type { CliLogger } from '../logger.js';

export type LogsCommandContext = {
  logger: CliLogger;
  log: (line: string) => void;
  paths: Pick<DashboardPaths, 'logsDir'>;
  exit: (code: number) => never;
};

export function createLogsCommand(program: Command, ctx: LogsCommandContext): void {
  program
    .command('logs')
    .description('Print the tail of a service log')
    .argument('[service]', 'Service name (jupyter, vscode, ssh, tunnel_jupyter, ...)', 'jupyter')
    .option('-n, --lines <n>', 'Number of lines', String(LOG_TAIL.DEFAULT_LINES))
    .action(async (service: string, options: { lines: string }) => {
      const lines = /^\d+$/.test(options.lines.trim()) ? Number(options.lines.trim()) : NaN;
      if (!Number.isSafeInteger(lines) || lines <= 0) {
        ctx.logger.error(`Invalid line count: ${options.lines}`);
        ctx.exit(1);
      }
      const text = await tailServiceLog(ctx.paths, service, Math.min(lines, LOG_TAIL.MAX_LINES));
      ctx.log(`=== Logs for ${service} ===`);
      ctx.log(text.replace(/\n$/, ''));
    });
}
