import type { Application, NextFunction, Request, Response } from 'express';

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type'
} as const;

/** Permissive CORS on every response; OPTIONS preflights end here with an empty 200. */
export function registerDefaultMiddleware(app: Application): void {
  app.disable('x-powered-by');
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.set(CORS_HEADERS);
    if (req.method === 'OPTIONS') {
      res.status(200).set('Content-Length', '0').end();
      return;
    }
    next();
  });
}
