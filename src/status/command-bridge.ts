import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

import { DEFAULT_CONFIG, TIMEOUTS } from '../constants/index.js';
import { errorCode, errorMessage } from '../utils/error-utils.js';
import { logProcessLifecycle } from '../utils/process-lifecycle-logger.js';

export type SpawnLike = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export type CommandRunResult =
  | {
      kind: 'completed';
      exitedZero: boolean;
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | { kind: 'timeout'; timeoutMs: number; stdout: string; stderr: string }
  | { kind: 'not_found'; executable: string }
  | { kind: 'error'; message: string };

export type CommandBridgeOptions = {
  executable?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  spawnImpl?: SpawnLike;
};

export type CommandResponse =
  | { success: boolean; stdout: string; stderr: string; command: string }
  | { success: false; error: string };

const SOURCE = 'status.command-bridge';

export function formatCommandLine(executable: string, argv: readonly string[]): string {
  return [executable, ...argv].join(' ');
}

function classifySpawnFailure(error: unknown, executable: string): CommandRunResult {
  if (errorCode(error) === 'ENOENT') {
    return { kind: 'not_found', executable };
  }
  return { kind: 'error', message: errorMessage(error) };
}

// Clean exits are routine (every status snapshot lists kernels) and are not recorded.
function logResult(command: string, result: CommandRunResult): void {
  switch (result.kind) {
    case 'completed':
      if (!result.exitedZero) {
        logProcessLifecycle({
          event: 'command_exit',
          source: SOURCE,
          details: { command, result: 'failed', exitCode: result.exitCode, signal: result.signal }
        });
      }
      return;
    case 'timeout':
      logProcessLifecycle({
        event: 'command_timeout',
        source: SOURCE,
        details: { command, result: 'killed', timeoutMs: result.timeoutMs }
      });
      return;
    case 'not_found':
      logProcessLifecycle({
        event: 'command_not_found',
        source: SOURCE,
        details: { command, result: 'failed', reason: 'ENOENT' }
      });
      return;
    case 'error':
      logProcessLifecycle({
        event: 'command_error',
        source: SOURCE,
        details: { command, result: 'failed', reason: result.message }
      });
  }
}

/**
 * Run the management executable with `argv` (no shell), capturing both
 * streams. Each call owns its child: on timeout the child is SIGKILLed and the
 * promise resolves after it has been reaped. Never rejects.
 */
export function runManagementCommand(
  argv: readonly string[],
  options: CommandBridgeOptions = {}
): Promise<CommandRunResult> {
  const executable = options.executable ?? DEFAULT_CONFIG.COMMAND_BIN;
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.COMMAND;
  const spawnImpl = options.spawnImpl ?? nodeSpawn;
  const command = formatCommandLine(executable, argv);

  return new Promise<CommandRunResult>((resolve) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    const settle = (result: CommandRunResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      logResult(command, result);
      resolve(result);
    };

    let child: ChildProcess;
    try {
      child = spawnImpl(executable, [...argv], {
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
        windowsHide: true,
        env: options.env ?? process.env
      });
    } catch (error) {
      settle(classifySpawnFailure(error, executable));
      return;
    }

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let runtimeError: unknown = null;

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.once('error', (error) => {
      if (child.pid === undefined) {
        // The process never started; no 'close' carrying an exit status will follow.
        settle(classifySpawnFailure(error, executable));
        return;
      }
      runtimeError = error;
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      const out = Buffer.concat(stdout).toString('utf8');
      const err = Buffer.concat(stderr).toString('utf8');
      if (timedOut) {
        settle({ kind: 'timeout', timeoutMs, stdout: out, stderr: err });
        return;
      }
      if (runtimeError) {
        settle({ kind: 'error', message: errorMessage(runtimeError) });
        return;
      }
      settle({ kind: 'completed', exitedZero: code === 0, exitCode: code, signal, stdout: out, stderr: err });
    });
  });
}

export function describeCommandResult(
  result: CommandRunResult,
  args: { executable: string; argv: readonly string[] }
): CommandResponse {
  switch (result.kind) {
    case 'completed':
      return {
        success: result.exitedZero,
        stdout: result.stdout,
        stderr: result.stderr,
        command: formatCommandLine(args.executable, args.argv)
      };
    case 'timeout':
      return { success: false, error: `Command timed out after ${Math.round(result.timeoutMs / 1000)} seconds` };
    case 'not_found':
      return { success: false, error: `${result.executable} command not found in PATH` };
    case 'error':
      return { success: false, error: result.message };
  }
}
