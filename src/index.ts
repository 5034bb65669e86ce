/**
 * CloudLab dashboard: liveness probes, status aggregation and the HTTP
 * surface that serves them.
 */

export { resolveDashboardPaths, ensureDashboardDirs, type DashboardPaths } from './config/dashboard-paths.js';
export { resolveDashboardEnv, parsePort, type DashboardEnv } from './config/env-config.js';
export {
  loadDashboardConfig,
  resolveServicePort,
  resolveServicePorts,
  resolveTunnelUrls,
  type DashboardConfig,
  type ServicePorts,
  type TunnelUrls
} from './config/dashboard-config.js';

export {
  createPosixExistenceChecker,
  createWindowsExistenceChecker,
  selectProcessExistenceChecker,
  type ProcessExistence,
  type ProcessExistenceChecker
} from './status/process-existence.js';
export { isProcessAlive, readPidMarker } from './status/process-probe.js';
export { isPortOpen } from './status/port-probe.js';
export { createLivenessProbes, isServiceUp, type LivenessProbes } from './status/service-status.js';
export {
  selectMetricsCollector,
  createHostMetricsCollector,
  createStubMetricsCollector,
  type SystemMetrics,
  type SystemMetricsCollector
} from './status/system-metrics.js';
export { tailServiceLog } from './status/log-tail.js';
export { listEnvironments, type EnvironmentDescriptor } from './status/environment-catalog.js';
export {
  runManagementCommand,
  describeCommandResult,
  type CommandRunResult,
  type CommandResponse
} from './status/command-bridge.js';
export {
  createStatusAggregator,
  createDefaultStatusAggregator,
  type StatusAggregator,
  type StatusSnapshot
} from './status/status-aggregator.js';

export { DashboardHttpServer, type DashboardServerOptions } from './server/dashboard-server.js';
