import type { Command } from 'commander';

import { describeCommandResult, type CommandRunResult } from '../../status/command-bridge.js';
import type { CliLogger } from '../logger.js';

export type RunCommandContext = {
  logger: CliLogger;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
  commandBin: string;
  runCommand: (argv: readonly string[]) => Promise<CommandRunResult>;
  exit: (code: number) => never;
};

export function createRunCommand(program: Command, ctx: RunCommandContext): void {
  program
    .command('run')
    .description(`Forward arguments to the ${ctx.commandBin} management command`)
    .argument('<args...>', 'Arguments passed through unchanged')
    .allowUnknownOption()
    .passThroughOptions()
    .action(async (args: string[]) => {
      const result = await ctx.runCommand(args);
      const response = describeCommandResult(result, { executable: ctx.commandBin, argv: args });
      if ('error' in response) {
        ctx.logger.error(response.error);
        ctx.exit(1);
      }
      ctx.writeOut(response.stdout);
      ctx.writeErr(response.stderr);
      ctx.exit(response.success ? 0 : 1);
    });
}
