/**
 * CloudLab dashboard shared constants.
 * Hard-coded values (ports, timeouts, file names) are kept here.
 */

// Local addresses
export const LOCAL_HOSTS = {
  IPV4: '127.0.0.1',
  IPV6: '::1',
  LOCALHOST: 'localhost',
  ANY: '0.0.0.0',
} as const;

// Defaults for the dashboard process itself
export const DEFAULT_CONFIG = {
  HOST: LOCAL_HOSTS.ANY,
  PORT: 3000,
  HOME_DIR_NAME: '.cloudlab',
  COMMAND_BIN: 'cloudlab',
} as const;

// Timeouts (ms)
export const TIMEOUTS = {
  PORT_PROBE: 1000,
  COMMAND: 120_000,
  KERNEL_LIST: 30_000,
  CPU_SAMPLE: 100,
  WINDOWS_TASKLIST: 5000,
} as const;

export const LOG_TAIL = {
  DEFAULT_LINES: 100,
  MAX_LINES: 10_000,
} as const;

// Primary services probed by PID marker and port. Port keys match config.json.
export const SERVICE_DEFINITIONS = [
  { name: 'jupyter', portKey: 'jupyter_port', defaultPort: 8888 },
  { name: 'vscode', portKey: 'vscode_port', defaultPort: 8080 },
  { name: 'ssh', portKey: 'ssh_port', defaultPort: 7681 },
] as const;

export const DASHBOARD_PORT_KEY = 'dashboard_port';

// Tunnel helpers have no port of their own and are probed by PID marker only.
export const TUNNEL_NAMES = ['tunnel_jupyter', 'tunnel_vscode', 'tunnel_ssh', 'tunnel_dashboard'] as const;

export const DEFAULT_ENVIRONMENT_NAME = 'cloudlab';

export const KERNEL_LIST_ARGS = ['kernel', 'list'] as const;

export const PLACEHOLDERS = {
  KERNELS_UNAVAILABLE: 'Unable to list kernels',
  noLogs: (service: string) => `No logs available for ${service}`,
} as const;

export const API_PATHS = {
  HEALTH: '/api/health',
  STATUS: '/api/status',
  LOGS: '/api/logs',
  KERNELS: '/api/kernels',
  ENVIRONMENTS: '/api/environments',
  COMMAND_PREFIX: '/api/command/',
} as const;

export const DASHBOARD_HTML_PATHS = ['/', '/index.html', '/dashboard.html'] as const;

export type ServiceDefinition = typeof SERVICE_DEFINITIONS[number];
export type ServiceName = ServiceDefinition['name'];
export type TunnelName = typeof TUNNEL_NAMES[number];
export type ApiPath = typeof API_PATHS[keyof typeof API_PATHS];
