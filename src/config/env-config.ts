import { DEFAULT_CONFIG } from '../constants/index.js';

export type DashboardEnv = {
  port: number;
  host: string;
  rootDir?: string;
  commandBin: string;
};

export function parsePort(value: unknown): number | null {
  const raw = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : '';
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  const port = Number(raw);
  return port >= 1 && port <= 65535 ? port : null;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function resolveDashboardEnv(env: NodeJS.ProcessEnv = process.env): DashboardEnv {
  return {
    port: parsePort(env.CLOUDLAB_PORT) ?? DEFAULT_CONFIG.PORT,
    host: readString(env, 'CLOUDLAB_HOST') ?? DEFAULT_CONFIG.HOST,
    rootDir: readString(env, 'CLOUDLAB_HOME'),
    commandBin: readString(env, 'CLOUDLAB_BIN') ?? DEFAULT_CONFIG.COMMAND_BIN
  };
}
