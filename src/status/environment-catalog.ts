import fs from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_ENVIRONMENT_NAME } from '../constants/index.js';
import type { DashboardPaths } from '../config/dashboard-paths.js';

export type EnvironmentDescriptor = {
  name: string;
  default: boolean;
  path: string;
};

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Default environment first (when present), then every directory under
 * `<root>/envs` in enumeration order. Enumeration order is platform dependent.
 */
export async function listEnvironments(
  paths: Pick<DashboardPaths, 'defaultEnvDir' | 'envsDir'>
): Promise<EnvironmentDescriptor[]> {
  const envs: EnvironmentDescriptor[] = [];
  if (await pathExists(paths.defaultEnvDir)) {
    envs.push({ name: DEFAULT_ENVIRONMENT_NAME, default: true, path: paths.defaultEnvDir });
  }

  let entries: string[];
  try {
    entries = await fs.readdir(paths.envsDir);
  } catch {
    return envs;
  }

  // stat (not lstat): a symlink to a directory counts as an environment.
  const checked = await Promise.all(
    entries.map(async (name) => {
      const envPath = path.join(paths.envsDir, name);
      return { name, envPath, dir: await isDirectory(envPath) };
    })
  );
  for (const entry of checked) {
    if (entry.dir) {
      envs.push({ name: entry.name, default: false, path: entry.envPath });
    }
  }
  return envs;
}
