import fs from 'node:fs/promises';
import path from 'node:path';

import type { DashboardPaths } from '../config/dashboard-paths.js';
import type { ProcessExistenceChecker } from './process-existence.js';

export type ProcessProbeDeps = {
  paths: Pick<DashboardPaths, 'pidsDir'>;
  checker: ProcessExistenceChecker;
};

export function resolvePidMarkerPath(paths: Pick<DashboardPaths, 'pidsDir'>, serviceName: string): string {
  return path.join(paths.pidsDir, `${serviceName}.pid`);
}

/** PID recorded by the process starter, or null when the marker is missing, unreadable or not a positive integer. */
export async function readPidMarker(paths: Pick<DashboardPaths, 'pidsDir'>, serviceName: string): Promise<number | null> {
  let raw: string;
  try {
    raw = (await fs.readFile(resolvePidMarkerPath(paths, serviceName), 'utf8')).trim();
  } catch {
    return null;
  }
  if (!/^\+?\d+$/.test(raw)) {
    return null;
  }
  const pid = Number(raw);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

export async function isProcessAlive(serviceName: string, deps: ProcessProbeDeps): Promise<boolean> {
  const pid = await readPidMarker(deps.paths, serviceName);
  if (pid === null) {
    return false;
  }
  const existence = await deps.checker.exists(pid);
  // EPERM means the process exists under another user. Reported as alive on purpose:
  // a false "up" is preferred over showing a running service as dead.
  if (existence === 'no-permission') {
    return true;
  }
  return existence === 'alive';
}
