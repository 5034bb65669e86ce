import fs from 'node:fs/promises';
import type { Application, ErrorRequestHandler, NextFunction, Request, Response } from 'express';

import { API_PATHS, DASHBOARD_HTML_PATHS, LOG_TAIL } from '../constants/index.js';
import type { DashboardPaths } from '../config/dashboard-paths.js';
import { describeCommandResult, type CommandRunResult } from '../status/command-bridge.js';
import { listEnvironments } from '../status/environment-catalog.js';
import { tailServiceLog } from '../status/log-tail.js';
import type { StatusAggregator } from '../status/status-aggregator.js';
import { mapErrorToHttp } from './utils/http-error-mapper.js';

export interface DashboardRouteOptions {
  app: Application;
  paths: DashboardPaths;
  aggregator: StatusAggregator;
  commandBin: string;
  runCommand: (argv: readonly string[]) => Promise<CommandRunResult>;
  getVersion: () => string;
  logError?: (msg: string) => void;
}

const DEFAULT_LOG_SERVICE = 'jupyter';

function firstQueryValue(value: unknown): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' && first !== '' ? first : undefined;
}

/** `lines` comes from the query string: anything unparsable is the default, the rest is clamped. */
export function parseLinesParam(value: unknown): number {
  const raw = firstQueryValue(value)?.trim();
  if (!raw || !/^[+-]?\d+$/.test(raw)) {
    return LOG_TAIL.DEFAULT_LINES;
  }
  return Math.min(LOG_TAIL.MAX_LINES, Math.max(1, Number(raw)));
}

/** Percent-decoded, non-empty segments after `/api/command/`; null when an escape is malformed. */
export function parseCommandSegments(pathname: string): string[] | null {
  const rest = pathname.slice(API_PATHS.COMMAND_PREFIX.length);
  try {
    return rest
      .split('/')
      .filter(Boolean)
      .map((segment) => decodeURIComponent(segment));
  } catch {
    return null;
  }
}

export function registerDashboardRoutes(options: DashboardRouteOptions): void {
  const { app, paths, aggregator } = options;
  const logError = options.logError ?? ((msg: string) => console.error(msg));

  app.get([...DASHBOARD_HTML_PATHS], async (_req: Request, res: Response) => {
    let content: Buffer;
    try {
      content = await fs.readFile(paths.dashboardHtml);
    } catch {
      res.status(404).json({ error: 'Dashboard HTML not found' });
      return;
    }
    res.status(200).set('Content-Type', 'text/html; charset=utf-8').send(content);
  });

  app.get(API_PATHS.HEALTH, (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', version: options.getVersion() });
  });

  app.get(API_PATHS.STATUS, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(await aggregator.snapshot());
    } catch (error) {
      next(error);
    }
  });

  app.get(API_PATHS.LOGS, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const service = firstQueryValue(req.query.service) ?? DEFAULT_LOG_SERVICE;
      const lines = parseLinesParam(req.query.lines);
      res.status(200).json({ service, log: await tailServiceLog(paths, service, lines) });
    } catch (error) {
      next(error);
    }
  });

  app.get(API_PATHS.KERNELS, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json({ kernels: await aggregator.listKernels() });
    } catch (error) {
      next(error);
    }
  });

  app.get(API_PATHS.ENVIRONMENTS, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json({ environments: await listEnvironments(paths) });
    } catch (error) {
      next(error);
    }
  });

  app.get(/^\/api\/command\/.*$/i, async (req: Request, res: Response, next: NextFunction) => {
    const argv = parseCommandSegments(req.path);
    if (argv === null) {
      res.status(400).json({ error: 'Malformed command path' });
      return;
    }
    if (argv.length === 0) {
      res.status(400).json({ error: 'No command specified' });
      return;
    }
    try {
      const result = await options.runCommand(argv);
      res.status(200).json(describeCommandResult(result, { executable: options.commandBin, argv }));
    } catch (error) {
      next(error);
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', path: req.path });
  });

  const handleError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    const mapped = mapErrorToHttp(error);
    logError(`[DashboardServer] ${req.method} ${req.path} failed: ${mapped.body.error.message}`);
    res.status(mapped.status).json(mapped.body);
  };
  app.use(handleError);
}
