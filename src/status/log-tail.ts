import fs from 'node:fs/promises';
import path from 'node:path';

import { PLACEHOLDERS } from '../constants/index.js';
import type { DashboardPaths } from '../config/dashboard-paths.js';

const SERVICE_NAME_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/;

export function isSafeServiceName(service: string): boolean {
  return SERVICE_NAME_PATTERN.test(service);
}

/** Splits after each newline so every line keeps its own terminator. */
export function takeLastLines(content: string, maxLines: number): string {
  if (maxLines <= 0 || !content) {
    return '';
  }
  const lines = content.split(/(?<=\n)/);
  return lines.slice(Math.max(0, lines.length - maxLines)).join('');
}

/**
 * Last `maxLines` lines of `<root>/logs/<service>.log`. The caller bounds
 * `maxLines`; a missing file or an unsafe service name yields the placeholder.
 */
export async function tailServiceLog(
  paths: Pick<DashboardPaths, 'logsDir'>,
  service: string,
  maxLines: number
): Promise<string> {
  if (!isSafeServiceName(service)) {
    return PLACEHOLDERS.noLogs(service);
  }
  try {
    const content = await fs.readFile(path.join(paths.logsDir, `${service}.log`), 'utf8');
    return takeLastLines(content, maxLines);
  } catch {
    return PLACEHOLDERS.noLogs(service);
  }
}
