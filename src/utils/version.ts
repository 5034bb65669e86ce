import fs from 'node:fs';
import path from 'node:path';

import { asRecord, safeReadJson } from './safe-read-json.js';

const PACKAGE_NAME = 'cloudlab-dashboard';

let cachedVersion: string | undefined;

// Walks up from this module: works from src/utils under ts-jest and from dist/src/utils after build.
function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const pkg = asRecord(safeReadJson(candidate));
      if (pkg?.name === PACKAGE_NAME) {
        return candidate;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export function getAppVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }
  const pkgPath = findPackageJson(__dirname);
  const version = pkgPath ? asRecord(safeReadJson(pkgPath))?.version : undefined;
  cachedVersion = typeof version === 'string' && version ? version : 'dev';
  return cachedVersion;
}
