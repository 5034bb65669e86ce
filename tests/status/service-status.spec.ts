import { describe, expect, it, jest } from '@jest/globals';

import { isServiceUp, resolveServiceStates, resolveTunnelStates, type LivenessProbes } from '../../src/status/service-status.js';

function probes(alive: string[], openPorts: number[]): LivenessProbes {
  return {
    isProcessAlive: async (name) => alive.includes(name),
    isPortOpen: async (port) => openPorts.includes(port)
  };
}

describe('service liveness', () => {
  it('is up when either the process or the port answers', async () => {
    await expect(isServiceUp('jupyter', 8888, probes(['jupyter'], []))).resolves.toBe(true);
    await expect(isServiceUp('jupyter', 8888, probes([], [8888]))).resolves.toBe(true);
    await expect(isServiceUp('jupyter', 8888, probes([], []))).resolves.toBe(false);
  });

  it('skips the port check when the process is alive', async () => {
    const isPortOpen = jest.fn(async (_port: number) => false);
    await isServiceUp('vscode', 8080, { isProcessAlive: async () => true, isPortOpen });
    expect(isPortOpen).not.toHaveBeenCalled();
  });

  it('resolves every primary service against its configured port', async () => {
    const states = await resolveServiceStates(
      { jupyter: 9999, vscode: 8080, ssh: 7681, dashboard: 3000 },
      probes(['ssh'], [9999])
    );
    expect(states).toEqual({ jupyter: true, vscode: false, ssh: true });
  });

  it('checks tunnels by pid marker only', async () => {
    await expect(resolveTunnelStates(probes(['tunnel_vscode', 'tunnel_dashboard'], []))).resolves.toEqual({
      tunnel_jupyter: false,
      tunnel_vscode: true,
      tunnel_ssh: false,
      tunnel_dashboard: true
    });
  });
});
