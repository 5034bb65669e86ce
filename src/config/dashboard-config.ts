import { DASHBOARD_PORT_KEY, DEFAULT_CONFIG, SERVICE_DEFINITIONS, type ServiceName } from '../constants/index.js';
import { asRecord, safeReadJson } from '../utils/safe-read-json.js';
import type { DashboardPaths } from './dashboard-paths.js';
import { parsePort } from './env-config.js';

/** Raw `config.json` contents. Every key is optional. */
export type DashboardConfig = Record<string, unknown>;

export type ServicePorts = Record<ServiceName, number> & { dashboard: number };

export type TunnelUrls = Record<string, string>;

/**
 * Read `config.json` from disk. Called on every request; never cached.
 * Missing, unreadable or non-object documents all resolve to `{}`.
 */
export function loadDashboardConfig(paths: Pick<DashboardPaths, 'configFile'>): DashboardConfig {
  return asRecord(safeReadJson(paths.configFile)) ?? {};
}

export function resolveServicePort(config: DashboardConfig, name: ServiceName): number {
  const def = SERVICE_DEFINITIONS.find((candidate) => candidate.name === name);
  if (!def) {
    return DEFAULT_CONFIG.PORT;
  }
  return parsePort(config[def.portKey]) ?? def.defaultPort;
}

export function resolveServicePorts(config: DashboardConfig): ServicePorts {
  return {
    jupyter: resolveServicePort(config, 'jupyter'),
    vscode: resolveServicePort(config, 'vscode'),
    ssh: resolveServicePort(config, 'ssh'),
    dashboard: parsePort(config[DASHBOARD_PORT_KEY]) ?? DEFAULT_CONFIG.PORT
  };
}

export function resolveTunnelUrls(config: DashboardConfig): TunnelUrls {
  const raw = asRecord(config.tunnel_urls);
  if (!raw) {
    return {};
  }
  const out: TunnelUrls = {};
  for (const [name, url] of Object.entries(raw)) {
    if (typeof url === 'string' && url.trim()) {
      out[name] = url;
    }
  }
  return out;
}
