import type { Command } from 'commander';

import { SERVICE_DEFINITIONS } from '../../constants/index.js';
import type { StatusAggregator, StatusSnapshot } from '../../status/status-aggregator.js';
import { errorMessage } from '../../utils/error-utils.js';
import type { CliLogger, Painter } from '../logger.js';
import type { Spinner } from '../spinner.js';

export type StatusCommandContext = {
  logger: CliLogger;
  log: (line: string) => void;
  createAggregator: () => StatusAggregator;
  createSpinner: (text: string) => Spinner;
  painter: Painter;
};

const NAME_WIDTH = 10;

function stateLabel(up: boolean, painter: Painter): string {
  return up ? painter.ok('● running') : painter.bad('○ stopped');
}

export function formatStatusLines(snapshot: StatusSnapshot, painter: Painter): string[] {
  const rows: Array<{ name: string; up: boolean; tunnelUp: boolean }> = [
    ...SERVICE_DEFINITIONS.map((def) => ({
      name: def.name,
      up: snapshot[def.name],
      tunnelUp: snapshot[`tunnel_${def.name}` as const]
    })),
    { name: 'dashboard', up: snapshot.dashboard, tunnelUp: snapshot.tunnel_dashboard }
  ];

  const lines = [painter.title('SERVICES')];
  for (const row of rows) {
    const url = snapshot.tunnel_urls[row.name];
    const tunnel = `tunnel ${row.tunnelUp ? painter.ok('up') : painter.dim('down')}`;
    lines.push(`  ${row.name.padEnd(NAME_WIDTH)} ${stateLabel(row.up, painter)}  ${tunnel}${url ? `  ${url}` : ''}`);
  }

  const sys = snapshot.system;
  lines.push('', painter.title('SYSTEM'));
  lines.push(`  CPU     ${sys.cpu_percent}% of ${sys.cpu_count} core(s)`);
  lines.push(`  Memory  ${sys.memory_percent}% of ${sys.memory_total} GB`);
  lines.push(`  Disk    ${sys.disk_percent}% of ${sys.disk_total} GB`);
  lines.push(`  ${painter.dim(`${sys.platform} · node ${sys.node_version}`)}`);

  lines.push('', painter.title('ENVIRONMENTS'));
  if (snapshot.environments.length === 0) {
    lines.push(`  ${painter.dim('none')}`);
  }
  for (const env of snapshot.environments) {
    lines.push(`  ${env.default ? '★' : '○'} ${env.name}${env.default ? ' (default)' : ''} - ${painter.dim(env.path)}`);
  }
  return lines;
}

export function createStatusCommand(program: Command, ctx: StatusCommandContext): void {
  program
    .command('status')
    .description('Show service liveness, host metrics and environments')
    .option('-j, --json', 'Output the raw snapshot as JSON')
    .action(async (options: { json?: boolean }) => {
      const spinner = options.json ? null : ctx.createSpinner('Collecting status...').start();
      try {
        const snapshot = await ctx.createAggregator().snapshot();
        spinner?.stop();
        if (options.json) {
          ctx.log(JSON.stringify(snapshot, null, 2));
          return;
        }
        for (const line of formatStatusLines(snapshot, ctx.painter)) {
          ctx.log(line);
        }
      } catch (error) {
        spinner?.fail('Status collection failed');
        ctx.logger.error(`Status check failed: ${errorMessage(error)}`);
      }
    });
}
