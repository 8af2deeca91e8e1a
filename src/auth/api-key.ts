import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * API key middleware: checks the X-API-Key header against the configured key.
 * With no key configured the API answers 503 rather than running open.
 */
export function apiKeyAuth(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = req.get('x-api-key');

    if (!expectedKey) {
      res.status(503).json({ error: 'API key not configured on server' });
      return;
    }

    if (!apiKey || apiKey !== expectedKey) {
      res.status(401).json({ error: 'Invalid or missing API key' });
      return;
    }

    next();
  };
}
