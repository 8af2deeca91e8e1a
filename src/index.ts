import os from 'node:os';
import { createServer } from 'node:http';
import { config } from './config.js';
import { createApp } from './api/routes.js';
import { openDatabase, type DatabaseHandle } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { MemoryAlertStore, SqliteAlertStore, type AlertStore } from './db/alert-store.js';
import { MemoryPreferenceStore, SqlitePreferenceStore, type PreferenceStore } from './db/preferences.js';
import { AlertEvaluator } from './alerts/evaluator.js';
import { NotificationDispatcher } from './alerts/dispatcher.js';
import { SettingsSource } from './alerts/settings.js';
import { errorMessage } from './alerts/errors.js';
import { TelegramTransport } from './clients/telegram.js';
import { AuthLogWatcher } from './monitor/auth-log.js';
import { RebootDetector } from './monitor/reboot.js';
import { isMonitorRunning, startMonitor, stopMonitor } from './monitor/index.js';
import type { ResourceOptions } from './monitor/thresholds.js';
import { NetworkMonitor } from './monitor/network.js';
import { startTelegramListener, stopTelegramListener } from './services/telegram-listener.js';

// Open the database and run migrations; fall back to in-memory state
let database: DatabaseHandle | null = null;
try {
  database = openDatabase(config.dbPath);
  runMigrations(database.sqlite);
} catch (err) {
  console.error('Failed to open database:', errorMessage(err));
  console.warn('Starting without database -- alert state will not survive a restart');
  database = null;
}

const store: AlertStore = database ? new SqliteAlertStore(database.db) : new MemoryAlertStore();
const prefs: PreferenceStore = database ? new SqlitePreferenceStore(database.db) : new MemoryPreferenceStore();

// Full reload of persisted alert state
try {
  const records = await store.loadAll();
  const active = records.filter((record) => record.active);
  console.log(`[Alerts] Loaded ${records.length} alert record(s), ${active.length} active`);
  for (const record of active) {
    console.log(`[Alerts]   ${record.identity} active since ${new Date(record.firstTriggeredAt ?? record.updatedAt).toISOString()}`);
  }
} catch (err) {
  console.error('[Alerts] Failed to load alert records:', errorMessage(err));
}

const hostLabel = config.hostLabel || os.hostname();
const settings = new SettingsSource(config.settingsPath);
await settings.load();

const transport = new TelegramTransport({
  token: config.telegramBotToken,
  chatId: config.telegramChatId,
  attempts: config.telegramSendAttempts,
  retryDelayMs: config.telegramRetryDelayMs,
});
if (!transport.isConfigured()) {
  console.warn('[Telegram] TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID not set -- notifications will only be logged');
}

const evaluator = new AlertEvaluator(store);
const dispatcher = new NotificationDispatcher(transport, { hostLabel: config.hostLabel });
const resourceOptions: ResourceOptions = {
  cpuSampleWindowMs: config.cpuSampleWindowMs,
  thermalPath: config.thermalPath,
};

// HTTP API
const sqlite = database?.sqlite;
const app = createApp({
  apiKey: config.apiKey,
  evaluator,
  settings,
  dispatcher,
  checkDatabase: sqlite ? () => { sqlite.prepare('SELECT 1').get(); } : null,
  isMonitorRunning,
});
const server = createServer(app);

startMonitor({
  resources: { settings, evaluator, dispatcher, resourceOptions },
  events: {
    settings,
    dispatcher,
    authLog: config.authLogPath ? new AuthLogWatcher(config.authLogPath, prefs) : null,
    reboot: new RebootDetector(prefs),
    hostLabel,
  },
  resourceIntervalMs: config.monitorPollIntervalMs,
  eventIntervalMs: config.eventsPollIntervalMs,
  startupDelayMs: config.startupDelayMs,
});

startTelegramListener(
  {
    token: config.telegramBotToken,
    chatId: config.telegramChatId,
    evaluator,
    settings,
    resourceOptions,
    network: new NetworkMonitor(config.procPath),
  },
  config.telegramListenerEnabled,
);

server.listen(config.port, () => {
  console.log(`hostwatch running on port ${config.port}`);
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Host: ${hostLabel}`);
  console.log(`  Health check: http://localhost:${config.port}/api/health`);
});

// Graceful shutdown
function shutdown(signal: string) {
  console.log(`\n[${signal}] Shutting down gracefully...`);
  stopTelegramListener();
  stopMonitor();
  server.close(() => {
    database?.sqlite.close();
    console.log('Server closed.');
    process.exit(0);
  });
  // Force exit after 10 seconds
  setTimeout(() => {
    console.error('Forced shutdown after timeout.');
    process.exit(1);
  }, 10000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
