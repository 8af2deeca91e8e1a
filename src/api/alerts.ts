/**
 * Alerts API -- inspect alert records and reset active ones.
 *
 * Endpoints:
 *  - GET  /api/alerts                    — All records (?active=true for open problems only)
 *  - POST /api/alerts/:identity/reset    — Administrative reset (no recovery notice)
 *
 * Identities contain ':' and often '/', so clients URL-encode them
 * (e.g. /api/alerts/disk%3A%2Fdata/reset).
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AlertEvaluator } from '../alerts/evaluator.js';
import { errorMessage } from '../alerts/errors.js';

export function createAlertsRouter(evaluator: AlertEvaluator): Router {
  const alertsRouter = Router();

  alertsRouter.get('/', async (req: Request, res: Response) => {
    try {
      const records = await evaluator.listRecords();
      const activeOnly = req.query.active === 'true';
      const alerts = activeOnly ? records.filter((record) => record.active) : records;
      res.json({ alerts, count: alerts.length });
    } catch (err) {
      console.error('[Alerts API] Failed to list alerts:', errorMessage(err));
      res.status(500).json({ error: 'Failed to list alerts' });
    }
  });

  alertsRouter.post('/:identity/reset', async (req: Request, res: Response) => {
    const { identity } = req.params;
    try {
      const result = await evaluator.reset(identity);
      switch (result) {
        case 'unknown':
          res.status(404).json({ error: `Unknown alert '${identity}'` });
          return;
        case 'not-active':
          res.status(409).json({ error: `Alert '${identity}' is not active` });
          return;
        case 'reset':
          console.log(`[Alerts API] ${identity} reset by operator`);
          res.json({ identity, reset: true });
          return;
      }
    } catch (err) {
      console.error(`[Alerts API] Failed to reset ${identity}:`, errorMessage(err));
      res.status(500).json({ error: 'Failed to reset alert' });
    }
  });

  return alertsRouter;
}
