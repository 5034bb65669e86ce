import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { resolveDashboardPaths, type DashboardPaths } from '../../src/config/dashboard-paths.js';

export function makeTempRoot(prefix = 'cloudlab-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function makeTempPaths(): DashboardPaths {
  const paths = resolveDashboardPaths({ rootDir: makeTempRoot() });
  fs.mkdirSync(paths.pidsDir, { recursive: true });
  fs.mkdirSync(paths.logsDir, { recursive: true });
  return paths;
}

export function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf8');
}

export function silentLogger() {
  const lines = { info: [] as string[], success: [] as string[], warning: [] as string[], error: [] as string[] };
  return {
    lines,
    logger: {
      info: (msg: string) => lines.info.push(msg),
      success: (msg: string) => lines.success.push(msg),
      warning: (msg: string) => lines.warning.push(msg),
      error: (msg: string) => lines.error.push(msg),
      debug: () => {}
    }
  };
}

export class ExitCalled extends Error {
  constructor(public readonly code: number) {
    super(`exit(${code})`);
  }
}

export function throwingExit(code: number): never {
  throw new ExitCalled(code);
}
