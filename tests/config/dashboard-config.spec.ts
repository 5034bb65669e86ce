import path from 'node:path';
import { describe, expect, it } from '@jest/globals';

import {
  loadDashboardConfig,
  resolveServicePort,
  resolveServicePorts,
  resolveTunnelUrls
} from '../../src/config/dashboard-config.js';
import { resolveDashboardPaths } from '../../src/config/dashboard-paths.js';
import { makeTempPaths, writeFile } from '../utils/helpers.js';

describe('dashboard config', () => {
  it('returns {} when config.json is missing', () => {
    const paths = makeTempPaths();
    expect(loadDashboardConfig(paths)).toEqual({});
  });

  it('returns {} for malformed json and for non-object documents', () => {
    const paths = makeTempPaths();
    writeFile(paths.configFile, '{ not json');
    expect(loadDashboardConfig(paths)).toEqual({});
    writeFile(paths.configFile, '[1, 2, 3]');
    expect(loadDashboardConfig(paths)).toEqual({});
  });

  it('re-reads the file on every call', () => {
    const paths = makeTempPaths();
    writeFile(paths.configFile, JSON.stringify({ jupyter_port: 9000 }));
    expect(loadDashboardConfig(paths)).toEqual({ jupyter_port: 9000 });
    writeFile(paths.configFile, JSON.stringify({ jupyter_port: 9001, extra: 'kept' }));
    expect(loadDashboardConfig(paths)).toEqual({ jupyter_port: 9001, extra: 'kept' });
  });

  it('falls back to default ports for absent or invalid values', () => {
    expect(resolveServicePorts({})).toEqual({ jupyter: 8888, vscode: 8080, ssh: 7681, dashboard: 3000 });
    expect(resolveServicePort({ jupyter_port: 'abc' }, 'jupyter')).toBe(8888);
    expect(resolveServicePort({ vscode_port: 70000 }, 'vscode')).toBe(8080);
    expect(resolveServicePort({ ssh_port: '2222' }, 'ssh')).toBe(2222);
    expect(resolveServicePorts({ dashboard_port: 4000 }).dashboard).toBe(4000);
  });

  it('keeps only non-empty string tunnel urls', () => {
    expect(resolveTunnelUrls({})).toEqual({});
    expect(resolveTunnelUrls({ tunnel_urls: 'nope' })).toEqual({});
    expect(
      resolveTunnelUrls({
        tunnel_urls: { jupyter: 'https://jupyter.example.test', vscode: '', ssh: 42 }
      })
    ).toEqual({ jupyter: 'https://jupyter.example.test' });
  });
});

describe('dashboard paths', () => {
  it('derives the layout from the root directory', () => {
    const root = path.resolve('/tmp/cloudlab-root');
    const paths = resolveDashboardPaths({ rootDir: root });
    expect(paths.configFile).toBe(path.join(root, 'config.json'));
    expect(paths.pidsDir).toBe(path.join(root, 'pids'));
    expect(paths.logsDir).toBe(path.join(root, 'logs'));
    expect(paths.defaultEnvDir).toBe(path.join(root, 'venv'));
    expect(paths.envsDir).toBe(path.join(root, 'envs'));
    expect(paths.dashboardHtml).toBe(path.join(root, 'dashboard.html'));
  });

  it('uses <home>/.cloudlab when no root is given', () => {
    const home = path.resolve('/tmp/some-home');
    expect(resolveDashboardPaths({ homeDir: home }).rootDir).toBe(path.join(home, '.cloudlab'));
  });
});
