import { Router } from 'express';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { NotificationDispatcher } from '../alerts/dispatcher.js';
import { errorMessage } from '../alerts/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let version = '1.0.0';
try {
  const pkgPath = join(__dirname, '..', '..', 'package.json');
  const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version: string };
  version = pkg.version;
} catch (err) {
  console.warn(`[Health] Could not read package version: ${errorMessage(err)}`);
}

export interface HealthDeps {
  /** Throws when the database is unreachable; null when running without one */
  checkDatabase: (() => void) | null;
  isMonitorRunning: () => boolean;
  dispatcher: NotificationDispatcher;
}

type ComponentStatus = 'up' | 'down' | 'disabled';

export function createHealthRouter(deps: HealthDeps): Router {
  const healthRouter = Router();

  healthRouter.get('/', (req, res) => {
    // Liveness check for Docker healthcheck compatibility
    if (req.query.liveness !== undefined) {
      res.json({ status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime(), version });
      return;
    }

    const start = Date.now();
    let database: { status: ComponentStatus; responseMs: number; error?: string };
    if (!deps.checkDatabase) {
      database = { status: 'disabled', responseMs: 0 };
    } else {
      try {
        deps.checkDatabase();
        database = { status: 'up', responseMs: Date.now() - start };
      } catch (err) {
        database = { status: 'down', responseMs: Date.now() - start, error: errorMessage(err) };
      }
    }

    const monitor: { status: ComponentStatus } = { status: deps.isMonitorRunning() ? 'up' : 'down' };
    const components = {
      database,
      monitor,
      notifications: deps.dispatcher.stats(),
    };

    const healthy = database.status === 'up' && monitor.status === 'up';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version,
      components,
    });
  });

  return healthRouter;
}
