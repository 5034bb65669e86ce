import { CommanderError } from 'commander';

import { createCliProgram, type CliProgramContext } from './program.js';

/** Parses `argv` without letting Commander exit the process; resolves with the exit code. */
export async function runCli(argv: string[], ctx: CliProgramContext): Promise<number> {
  const program = createCliProgram(ctx);

  try {
    await program.parseAsync(argv, { from: 'node' });
    return 0;
  } catch (err) {
    return err instanceof CommanderError ? err.exitCode : 1;
  }
}
