import { describe, expect, it, jest } from '@jest/globals';

import {
  createPosixExistenceChecker,
  createWindowsExistenceChecker,
  parseTasklistOutput,
  type ExecFileLike,
  type ProcessExistenceChecker
} from '../../src/status/process-existence.js';
import { isProcessAlive, readPidMarker, resolvePidMarkerPath } from '../../src/status/process-probe.js';
import { makeTempPaths, writeFile } from '../utils/helpers.js';

function errnoError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(code);
  err.code = code;
  return err;
}

describe('pid markers', () => {
  it('reads a trimmed positive integer', async () => {
    const paths = makeTempPaths();
    writeFile(resolvePidMarkerPath(paths, 'jupyter'), '  4242\n');
    await expect(readPidMarker(paths, 'jupyter')).resolves.toBe(4242);
  });

  it('rejects missing, non-numeric, zero and negative markers', async () => {
    const paths = makeTempPaths();
    await expect(readPidMarker(paths, 'vscode')).resolves.toBeNull();
    for (const content of ['abc', '12abc', '0', '-5', '']) {
      writeFile(resolvePidMarkerPath(paths, 'ssh'), content);
      await expect(readPidMarker(paths, 'ssh')).resolves.toBeNull();
    }
  });
});

describe('isProcessAlive', () => {
  const posix = createPosixExistenceChecker();

  it('is true for the current process', async () => {
    const paths = makeTempPaths();
    writeFile(resolvePidMarkerPath(paths, 'jupyter'), String(process.pid));
    await expect(isProcessAlive('jupyter', { paths, checker: posix })).resolves.toBe(true);
  });

  it('is false without a marker and for a non-numeric marker', async () => {
    const paths = makeTempPaths();
    await expect(isProcessAlive('jupyter', { paths, checker: posix })).resolves.toBe(false);
    writeFile(resolvePidMarkerPath(paths, 'jupyter'), 'abc');
    await expect(isProcessAlive('jupyter', { paths, checker: posix })).resolves.toBe(false);
  });

  it('reports a process owned by another user as alive', async () => {
    const paths = makeTempPaths();
    writeFile(resolvePidMarkerPath(paths, 'ssh'), '1');
    const checker: ProcessExistenceChecker = { exists: async () => 'no-permission' };
    await expect(isProcessAlive('ssh', { paths, checker })).resolves.toBe(true);
  });

  it('does not consult the checker when the marker is invalid', async () => {
    const paths = makeTempPaths();
    writeFile(resolvePidMarkerPath(paths, 'ssh'), 'garbage');
    const exists = jest.fn<ProcessExistenceChecker['exists']>(async () => 'alive');
    await expect(isProcessAlive('ssh', { paths, checker: { exists } })).resolves.toBe(false);
    expect(exists).not.toHaveBeenCalled();
  });
});

describe('posix existence checker', () => {
  it('maps EPERM to no-permission and ESRCH to not-found', async () => {
    const eperm = createPosixExistenceChecker(() => {
      throw errnoError('EPERM');
    });
    const esrch = createPosixExistenceChecker(() => {
      throw errnoError('ESRCH');
    });
    await expect(eperm.exists(100)).resolves.toBe('no-permission');
    await expect(esrch.exists(100)).resolves.toBe('not-found');
  });

  it('sends signal 0 only', async () => {
    const kill = jest.fn((_pid: number, _signal?: string | number) => true);
    await expect(createPosixExistenceChecker(kill).exists(321)).resolves.toBe('alive');
    expect(kill).toHaveBeenCalledWith(321, 0);
  });
});

describe('windows existence checker', () => {
  it('finds the pid column in tasklist output', () => {
    const output = '\r\nnode.exe                      1234 Console                    1     30,120 K\r\n';
    expect(parseTasklistOutput(output, 1234)).toBe(true);
    expect(parseTasklistOutput(output, 123)).toBe(false);
    expect(parseTasklistOutput('INFO: No tasks are running which match the specified criteria.', 1234)).toBe(false);
    expect(parseTasklistOutput('"node.exe","1234","Console","1","30,120 K"', 1234)).toBe(true);
  });

  it('runs tasklist with a pid filter', async () => {
    const calls: string[][] = [];
    const checker = createWindowsExistenceChecker((file, args, _options, callback) => {
      calls.push([file, ...args]);
      callback(null, 'node.exe   777 Console   1   10,000 K', '');
    });
    await expect(checker.exists(777)).resolves.toBe('alive');
    expect(calls).toEqual([['tasklist', '/FI', 'PID eq 777', '/NH']]);
  });

  it('treats a failed or timed out tasklist run as not-found', async () => {
    const checker = createWindowsExistenceChecker((_file, _args, _options, callback) => {
      callback(new Error('Command failed: tasklist'), '', '');
    });
    await expect(checker.exists(777)).resolves.toBe('not-found');
  });

  it('keeps the event loop free while tasklist runs', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const slowTasklist: ExecFileLike = (_file, args, _options, callback) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      const pid = (args[1] ?? '').replace('PID eq ', '');
      setTimeout(() => {
        inFlight -= 1;
        callback(null, `node.exe   ${pid} Console   1   10,000 K`, '');
      }, 50);
    };
    const checker = createWindowsExistenceChecker(slowTasklist);

    let immediateRan = false;
    setImmediate(() => {
      immediateRan = true;
    });
    const pending = Promise.all([checker.exists(11), checker.exists(12), checker.exists(13)]);
    expect(immediateRan).toBe(false);

    await expect(pending).resolves.toEqual(['alive', 'alive', 'alive']);
    expect(immediateRan).toBe(true);
    expect(maxInFlight).toBe(3);
  });
});
