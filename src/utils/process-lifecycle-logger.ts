import fs from 'node:fs/promises';
import fsSync from 'node:fs';
import path from 'node:path';

import { resolveDashboardPaths } from '../config/dashboard-paths.js';
import { errorCode } from './error-utils.js';

export type LifecycleEventName =
  | 'command_exit'
  | 'command_timeout'
  | 'command_not_found'
  | 'command_error'
  | 'server_listen'
  | 'server_stop'
  | 'signal_shutdown';

export interface ProcessLifecycleEvent {
  event: LifecycleEventName;
  source: string;
  details?: Record<string, unknown>;
}

/** Rotate once the active file passes this size; one `.1` generation is kept. */
export const DEFAULT_LIFECYCLE_MAX_BYTES = 1024 * 1024;

const ENV_LOG = 'CLOUDLAB_DASHBOARD_LIFECYCLE_LOG';
const ENV_CONSOLE = 'CLOUDLAB_DASHBOARD_LIFECYCLE_CONSOLE';
const ENV_MAX_BYTES = 'CLOUDLAB_DASHBOARD_LIFECYCLE_MAX_BYTES';

let pending: Promise<void> = Promise.resolve();

function logFilePath(): string {
  const override = process.env[ENV_LOG]?.trim();
  return override || resolveDashboardPaths({ rootDir: process.env.CLOUDLAB_HOME }).lifecycleLogFile;
}

function maxBytes(): number {
  const raw = Number(process.env[ENV_MAX_BYTES]);
  return Number.isInteger(raw) && raw > 0 ? raw : DEFAULT_LIFECYCLE_MAX_BYTES;
}

// Off unless asked for; when on it goes to stderr so stdout stays machine-readable.
function echoEnabled(): boolean {
  return ['1', 'true', 'yes', 'on'].includes((process.env[ENV_CONSOLE] ?? '').trim().toLowerCase());
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const code = errorCode(value);
    return { name: value.name, message: value.message, ...(code ? { code } : {}) };
  }
  return value;
}

function toLine(event: ProcessLifecycleEvent): string {
  const record = {
    ts: new Date().toISOString(),
    pid: process.pid,
    event: event.event,
    source: event.source,
    details: event.details
  };
  return `${JSON.stringify(record, jsonReplacer)}\n`;
}

export function formatLifecycleEcho(event: ProcessLifecycleEvent): string {
  const pairs = Object.entries(event.details ?? {})
    .filter(([, value]) => value !== undefined && value !== null && value !== '')
    .map(([key, value]) => `${key}=${value instanceof Error ? value.message : String(value)}`);
  return ['[cloudlab.lifecycle]', event.event, `source=${event.source}`, ...pairs].join(' ');
}

function echo(event: ProcessLifecycleEvent): void {
  if (echoEnabled()) {
    console.error(formatLifecycleEcho(event));
  }
}

async function writeLine(line: string): Promise<void> {
  const file = logFilePath();
  await fs.mkdir(path.dirname(file), { recursive: true });
  const size = await fs.stat(file).then(
    (stats) => stats.size,
    () => 0
  );
  if (size > 0 && size + Buffer.byteLength(line) > maxBytes()) {
    await fs.rename(file, `${file}.1`);
  }
  await fs.appendFile(file, line, 'utf8');
}

function writeLineSync(line: string): void {
  const file = logFilePath();
  fsSync.mkdirSync(path.dirname(file), { recursive: true });
  const size = fsSync.existsSync(file) ? fsSync.statSync(file).size : 0;
  if (size > 0 && size + Buffer.byteLength(line) > maxBytes()) {
    fsSync.renameSync(file, `${file}.1`);
  }
  fsSync.appendFileSync(file, line, 'utf8');
}

function reportWriteFailure(error: unknown): void {
  console.error(`[cloudlab.lifecycle] write failed: ${error instanceof Error ? error.message : String(error)}`);
}

/** Queued append; writes stay in call order. Write failures are reported, never thrown. */
export function logProcessLifecycle(event: ProcessLifecycleEvent): void {
  echo(event);
  const line = toLine(event);
  pending = pending.then(() => writeLine(line)).catch(reportWriteFailure);
}

/** For signal handlers, where the process may exit before the queue drains. */
export function logProcessLifecycleSync(event: ProcessLifecycleEvent): void {
  echo(event);
  try {
    writeLineSync(toLine(event));
  } catch (error) {
    reportWriteFailure(error);
  }
}

export async function flushProcessLifecycleLogQueue(): Promise<void> {
  await pending;
}
