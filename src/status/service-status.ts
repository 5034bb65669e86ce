import { SERVICE_DEFINITIONS, TUNNEL_NAMES, type ServiceName, type TunnelName } from '../constants/index.js';
import type { DashboardPaths } from '../config/dashboard-paths.js';
import type { ServicePorts } from '../config/dashboard-config.js';
import type { ProcessExistenceChecker } from './process-existence.js';
import { isProcessAlive } from './process-probe.js';
import { isPortOpen } from './port-probe.js';

export type LivenessProbes = {
  isProcessAlive: (serviceName: string) => Promise<boolean>;
  isPortOpen: (port: number) => Promise<boolean>;
};

export type ServiceStates = Record<ServiceName, boolean>;
export type TunnelStates = Record<TunnelName, boolean>;

export function createLivenessProbes(args: {
  paths: Pick<DashboardPaths, 'pidsDir'>;
  checker: ProcessExistenceChecker;
  portProbeTimeoutMs?: number;
}): LivenessProbes {
  return {
    isProcessAlive: (serviceName) => isProcessAlive(serviceName, { paths: args.paths, checker: args.checker }),
    isPortOpen: (port) => isPortOpen(port, { timeoutMs: args.portProbeTimeoutMs })
  };
}

/**
 * A service is up when its PID marker points at a live process OR something
 * accepts connections on its port. The OR keeps false negatives low: a stale
 * marker with a listening port, or a fresh process not yet listening, both count.
 */
export async function isServiceUp(name: string, port: number, probes: LivenessProbes): Promise<boolean> {
  if (await probes.isProcessAlive(name)) {
    return true;
  }
  return await probes.isPortOpen(port);
}

export async function resolveServiceStates(ports: ServicePorts, probes: LivenessProbes): Promise<ServiceStates> {
  const results = await Promise.all(
    SERVICE_DEFINITIONS.map(async (def) => [def.name, await isServiceUp(def.name, ports[def.name], probes)] as const)
  );
  const states: ServiceStates = { jupyter: false, vscode: false, ssh: false };
  for (const [name, up] of results) {
    states[name] = up;
  }
  return states;
}

export async function resolveTunnelStates(probes: LivenessProbes): Promise<TunnelStates> {
  const results = await Promise.all(TUNNEL_NAMES.map(async (name) => [name, await probes.isProcessAlive(name)] as const));
  const states: TunnelStates = {
    tunnel_jupyter: false,
    tunnel_vscode: false,
    tunnel_ssh: false,
    tunnel_dashboard: false
  };
  for (const [name, up] of results) {
    states[name] = up;
  }
  return states;
}
