import type { Command } from 'commander';

import type { DashboardPaths } from '../../config/dashboard-paths.js';
import { listEnvironments } from '../../status/environment-catalog.js';
import type { CliLogger } from '../logger.js';

export type EnvsCommandContext = {
  logger: CliLogger;
  log: (line: string) => void;
  paths: Pick<DashboardPaths, 'defaultEnvDir' | 'envsDir'>;
};

export function createEnvsCommand(program: Command, ctx: EnvsCommandContext): void {
  program
    .command('envs')
    .description('List managed runtime environments')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: { json?: boolean }) => {
      const envs = await listEnvironments(ctx.paths);
      if (options.json) {
        ctx.log(JSON.stringify({ environments: envs }, null, 2));
        return;
      }
      if (envs.length === 0) {
        ctx.logger.info('No environments found');
        return;
      }
      for (const env of envs) {
        ctx.log(env.default ? `★ ${env.name} (default) - ${env.path}` : `○ ${env.name} - ${env.path}`);
      }
    });
}
