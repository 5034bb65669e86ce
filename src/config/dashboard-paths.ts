import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

import { DEFAULT_CONFIG } from '../constants/index.js';

export type DashboardPaths = {
  rootDir: string;
  configFile: string;
  pidsDir: string;
  logsDir: string;
  defaultEnvDir: string;
  envsDir: string;
  dashboardHtml: string;
  lifecycleLogFile: string;
};

/**
 * Resolve the on-disk layout shared with the `cloudlab` executable.
 * `rootDir` wins over `homeDir`; without either the user's home is used.
 */
export function resolveDashboardPaths(options: { rootDir?: string; homeDir?: string } = {}): DashboardPaths {
  const explicitRoot = typeof options.rootDir === 'string' && options.rootDir.trim() ? options.rootDir.trim() : '';
  const resolvedHome = typeof options.homeDir === 'string' && options.homeDir.trim() ? options.homeDir.trim() : homedir();
  const rootDir = explicitRoot ? path.resolve(explicitRoot) : path.join(resolvedHome, DEFAULT_CONFIG.HOME_DIR_NAME);
  const logsDir = path.join(rootDir, 'logs');
  return {
    rootDir,
    configFile: path.join(rootDir, 'config.json'),
    pidsDir: path.join(rootDir, 'pids'),
    logsDir,
    defaultEnvDir: path.join(rootDir, 'venv'),
    envsDir: path.join(rootDir, 'envs'),
    dashboardHtml: path.join(rootDir, 'dashboard.html'),
    lifecycleLogFile: path.join(logsDir, 'dashboard-lifecycle.jsonl')
  };
}

export function ensureDashboardDirs(paths: DashboardPaths): void {
  for (const dir of [paths.rootDir, paths.logsDir, paths.pidsDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
