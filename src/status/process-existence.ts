import { execFile } from 'node:child_process';

import { TIMEOUTS } from '../constants/index.js';
import { errorCode } from '../utils/error-utils.js';

export type ProcessExistence = 'alive' | 'no-permission' | 'not-found';

/** One operation: does `pid` refer to a live process on this host. Never rejects. */
export interface ProcessExistenceChecker {
  exists(pid: number): Promise<ProcessExistence>;
}

export type ProcessKillLike = (pid: number, signal?: string | number) => boolean;

export type ExecFileLike = (
  file: string,
  args: string[],
  options: { encoding: 'utf8'; timeout: number; windowsHide: boolean },
  callback: (error: Error | null, stdout: string, stderr: string) => void
) => void;

const nodeExecFile: ExecFileLike = (file, args, options, callback) => {
  execFile(file, args, options, callback);
};

function isValidPid(pid: number): boolean {
  return Number.isSafeInteger(pid) && pid > 0;
}

/** Signal 0 performs the permission and existence checks without delivering a signal. */
export function createPosixExistenceChecker(
  processKill: ProcessKillLike = process.kill.bind(process)
): ProcessExistenceChecker {
  return {
    async exists(pid: number): Promise<ProcessExistence> {
      if (!isValidPid(pid)) {
        return 'not-found';
      }
      try {
        processKill(pid, 0);
        return 'alive';
      } catch (error) {
        return errorCode(error) === 'EPERM' ? 'no-permission' : 'not-found';
      }
    }
  };
}

export function parseTasklistOutput(output: string, pid: number): boolean {
  const wanted = String(pid);
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .some((line) => {
      // "node.exe   1234 Console   1   30,120 K" (CSV when /FO CSV is used)
      const columns = line.includes('","') ? line.split('","') : line.split(/\s+/);
      return columns.length > 1 && columns[1]?.replace(/"/g, '') === wanted;
    });
}

/** Runs `tasklist` asynchronously so concurrent probes never hold the event loop. */
export function createWindowsExistenceChecker(execFileImpl: ExecFileLike = nodeExecFile): ProcessExistenceChecker {
  return {
    exists(pid: number): Promise<ProcessExistence> {
      if (!isValidPid(pid)) {
        return Promise.resolve('not-found');
      }
      return new Promise<ProcessExistence>((resolve) => {
        try {
          execFileImpl(
            'tasklist',
            ['/FI', `PID eq ${pid}`, '/NH'],
            { encoding: 'utf8', timeout: TIMEOUTS.WINDOWS_TASKLIST, windowsHide: true },
            (error, stdout) => {
              // A timeout or non-zero exit arrives as `error`.
              if (error) {
                resolve('not-found');
                return;
              }
              resolve(parseTasklistOutput(stdout, pid) ? 'alive' : 'not-found');
            }
          );
        } catch {
          resolve('not-found');
        }
      });
    }
  };
}

export function selectProcessExistenceChecker(platform: NodeJS.Platform = process.platform): ProcessExistenceChecker {
  return platform === 'win32' ? createWindowsExistenceChecker() : createPosixExistenceChecker();
}
