import express, { Router } from 'express';
import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { createHealthRouter, type HealthDeps } from './health.js';
import { createAlertsRouter } from './alerts.js';
import { apiKeyAuth } from '../auth/api-key.js';
import type { AlertEvaluator } from '../alerts/evaluator.js';
import type { SettingsProvider } from '../alerts/settings.js';

export interface ApiDeps extends HealthDeps {
  apiKey: string;
  evaluator: AlertEvaluator;
  settings: SettingsProvider;
}

const testNotificationSchema = z.object({
  text: z.string().trim().min(1).max(4000).optional(),
});

export function createRouter(deps: ApiDeps): Router {
  const router = Router();

  // Public routes (no auth required)
  router.use('/api/health', createHealthRouter(deps));

  // API key auth for all other /api/* routes
  router.use('/api', apiKeyAuth(deps.apiKey));

  router.use('/api/alerts', createAlertsRouter(deps.evaluator));

  // GET /api/settings -- effective settings from the last successful load
  router.get('/api/settings', (_req: Request, res: Response) => {
    res.json(deps.settings.current());
  });

  // POST /api/notifications/test { text?: string }
  router.post('/api/notifications/test', async (req: Request, res: Response) => {
    const parsed = testNotificationSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((issue) => issue.message).join('; ') });
      return;
    }

    const result = await deps.dispatcher.sendText(parsed.data.text ?? '🧪 Test notification');
    if (!result.delivered) {
      res.status(502).json({ delivered: false, error: result.error?.message ?? 'delivery failed' });
      return;
    }
    res.json({ delivered: true, text: result.text });
  });

  return router;
}

/**
 * Express app with JSON body parsing and all routes mounted.
 */
export function createApp(deps: ApiDeps): Express {
  const app = express();
  app.use(express.json());
  app.use(createRouter(deps));
  return app;
}
