import { describe, expect, it, jest } from '@jest/globals';

import type { CommandRunResult } from '../../src/status/command-bridge.js';
import {
  createStatusAggregator,
  type RunCommand,
  type StatusAggregatorDeps
} from '../../src/status/status-aggregator.js';
import { createStubMetricsCollector, placeholderMetrics } from '../../src/status/system-metrics.js';

function completed(stdout: string): CommandRunResult {
  return { kind: 'completed', exitedZero: true, exitCode: 0, signal: null, stdout, stderr: '' };
}

function deps(overrides: Partial<StatusAggregatorDeps> = {}): StatusAggregatorDeps {
  return {
    loadConfig: () => ({ jupyter_port: 9999, tunnel_urls: { jupyter: 'https://j.example.test' } }),
    probes: {
      isProcessAlive: async (name) => name === 'vscode' || name === 'tunnel_jupyter',
      isPortOpen: async (port) => port === 9999
    },
    metrics: createStubMetricsCollector(),
    runCommand: async () => completed('python3 (default)\n'),
    listEnvironments: async () => [{ name: 'cloudlab', default: true, path: '/tmp/venv' }],
    warn: () => {},
    ...overrides
  };
}

describe('status aggregator', () => {
  it('assembles a full snapshot', async () => {
    const snapshot = await createStatusAggregator(deps()).snapshot();
    expect(snapshot).toEqual({
      jupyter: true,
      vscode: true,
      ssh: false,
      dashboard: true,
      tunnel_jupyter: true,
      tunnel_vscode: false,
      tunnel_ssh: false,
      tunnel_dashboard: false,
      config: { jupyter_port: 9999, tunnel_urls: { jupyter: 'https://j.example.test' } },
      tunnel_urls: { jupyter: 'https://j.example.test' },
      system: placeholderMetrics(),
      kernels: 'python3 (default)\n',
      environments: [{ name: 'cloudlab', default: true, path: '/tmp/venv' }]
    });
  });

  it('asks the management command for kernels with its own timeout', async () => {
    const runCommand = jest.fn<RunCommand>(async () => completed('k\n'));
    await createStatusAggregator(deps({ runCommand, kernelListTimeoutMs: 1234 })).listKernels();
    expect(runCommand).toHaveBeenCalledWith(['kernel', 'list'], { timeoutMs: 1234 });
  });

  it('uses the placeholder when kernel listing does not complete', async () => {
    const aggregator = createStatusAggregator(
      deps({ runCommand: async () => ({ kind: 'not_found', executable: 'cloudlab' }) })
    );
    await expect(aggregator.listKernels()).resolves.toBe('Unable to list kernels');
  });

  it('still answers when every sub-step fails', async () => {
    const warnings: string[] = [];
    const boom = (): never => {
      throw new Error('boom');
    };
    const aggregator = createStatusAggregator({
      loadConfig: boom,
      probes: { isProcessAlive: boom, isPortOpen: async () => boom() },
      metrics: { kind: 'host', collect: async () => boom() },
      runCommand: async () => boom(),
      listEnvironments: async () => boom(),
      warn: (msg) => warnings.push(msg)
    });

    const snapshot = await aggregator.snapshot();
    expect(snapshot.dashboard).toBe(true);
    expect(snapshot.jupyter).toBe(false);
    expect(snapshot.tunnel_ssh).toBe(false);
    expect(snapshot.config).toEqual({});
    expect(snapshot.tunnel_urls).toEqual({});
    expect(snapshot.system).toEqual(placeholderMetrics());
    expect(snapshot.kernels).toBe('Unable to list kernels');
    expect(snapshot.environments).toEqual([]);
    expect(warnings).toContain('[StatusAggregator] config load failed: boom');
    expect(warnings).toContain('[StatusAggregator] environment listing failed: boom');
  });

  it('reports dashboard true even with an empty configuration', async () => {
    const snapshot = await createStatusAggregator(deps({ loadConfig: () => ({}) })).snapshot();
    expect(snapshot.dashboard).toBe(true);
    expect(snapshot.config).toEqual({});
  });
});
