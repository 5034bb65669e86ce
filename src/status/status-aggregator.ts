import { KERNEL_LIST_ARGS, PLACEHOLDERS, TIMEOUTS } from '../constants/index.js';
import {
  loadDashboardConfig,
  resolveServicePorts,
  resolveTunnelUrls,
  type DashboardConfig,
  type TunnelUrls
} from '../config/dashboard-config.js';
import type { DashboardPaths } from '../config/dashboard-paths.js';
import { errorMessage } from '../utils/error-utils.js';
import type { CommandBridgeOptions, CommandRunResult } from './command-bridge.js';
import { runManagementCommand } from './command-bridge.js';
import { listEnvironments, type EnvironmentDescriptor } from './environment-catalog.js';
import { selectProcessExistenceChecker } from './process-existence.js';
import {
  createLivenessProbes,
  resolveServiceStates,
  resolveTunnelStates,
  type LivenessProbes,
  type ServiceStates,
  type TunnelStates
} from './service-status.js';
import { placeholderMetrics, selectMetricsCollector, type SystemMetrics, type SystemMetricsCollector } from './system-metrics.js';

export type StatusSnapshot = ServiceStates &
  TunnelStates & {
    dashboard: true;
    config: DashboardConfig;
    tunnel_urls: TunnelUrls;
    system: SystemMetrics;
    kernels: string;
    environments: EnvironmentDescriptor[];
  };

export type RunCommand = (argv: readonly string[], options?: Pick<CommandBridgeOptions, 'timeoutMs'>) => Promise<CommandRunResult>;

export type StatusAggregatorDeps = {
  loadConfig: () => DashboardConfig;
  probes: LivenessProbes;
  metrics: SystemMetricsCollector;
  runCommand: RunCommand;
  listEnvironments: () => Promise<EnvironmentDescriptor[]>;
  kernelListTimeoutMs?: number;
  warn?: (msg: string) => void;
};

export interface StatusAggregator {
  snapshot(): Promise<StatusSnapshot>;
  listKernels(): Promise<string>;
}

export function createStatusAggregator(deps: StatusAggregatorDeps): StatusAggregator {
  const warn = deps.warn ?? ((msg: string) => console.warn(msg));

  // A failing sub-step is replaced by its default so the rest of the snapshot still renders.
  const isolate = async <T>(label: string, step: () => Promise<T> | T, fallback: () => T): Promise<T> => {
    try {
      return await step();
    } catch (error) {
      warn(`[StatusAggregator] ${label} failed: ${errorMessage(error)}`);
      return fallback();
    }
  };

  const listKernels = async (): Promise<string> => {
    const result = await deps.runCommand(KERNEL_LIST_ARGS, {
      timeoutMs: deps.kernelListTimeoutMs ?? TIMEOUTS.KERNEL_LIST
    });
    return result.kind === 'completed' ? result.stdout : PLACEHOLDERS.KERNELS_UNAVAILABLE;
  };

  return {
    listKernels: () => isolate('kernel listing', listKernels, () => PLACEHOLDERS.KERNELS_UNAVAILABLE),

    async snapshot(): Promise<StatusSnapshot> {
      const config = await isolate('config load', () => deps.loadConfig(), (): DashboardConfig => ({}));
      const ports = resolveServicePorts(config);

      const [services, tunnels, system, kernels, environments] = await Promise.all([
        isolate('service probes', () => resolveServiceStates(ports, deps.probes), (): ServiceStates => ({
          jupyter: false,
          vscode: false,
          ssh: false
        })),
        isolate('tunnel probes', () => resolveTunnelStates(deps.probes), (): TunnelStates => ({
          tunnel_jupyter: false,
          tunnel_vscode: false,
          tunnel_ssh: false,
          tunnel_dashboard: false
        })),
        isolate('system metrics', () => deps.metrics.collect(), placeholderMetrics),
        isolate('kernel listing', listKernels, () => PLACEHOLDERS.KERNELS_UNAVAILABLE),
        isolate('environment listing', deps.listEnvironments, (): EnvironmentDescriptor[] => [])
      ]);

      return {
        ...services,
        // A dashboard that answers is running.
        dashboard: true,
        ...tunnels,
        config,
        tunnel_urls: resolveTunnelUrls(config),
        system,
        kernels,
        environments
      };
    }
  };
}

/** Production wiring: real probes against `paths`, metrics collector chosen once. */
export function createDefaultStatusAggregator(args: {
  paths: DashboardPaths;
  commandBin: string;
  metrics?: SystemMetricsCollector;
}): StatusAggregator {
  const probes = createLivenessProbes({ paths: args.paths, checker: selectProcessExistenceChecker() });
  return createStatusAggregator({
    loadConfig: () => loadDashboardConfig(args.paths),
    probes,
    metrics: args.metrics ?? selectMetricsCollector(),
    runCommand: (argv, options) => runManagementCommand(argv, { executable: args.commandBin, ...options }),
    listEnvironments: () => listEnvironments(args.paths)
  });
}
