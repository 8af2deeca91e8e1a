import 'dotenv/config';

/** Integer env var; unset or non-numeric values fall back to the default */
function intEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return isNaN(parsed) ? fallback : parsed;
}

export const config = {
  port: intEnv('PORT', 4100),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Database (alert records, watcher offsets)
  dbPath: process.env.DB_PATH || './data/hostwatch.db',

  // Hot-reloaded monitor settings (thresholds, mount points, alert policy)
  settingsPath: process.env.SETTINGS_PATH || './data/settings.json',

  // API key for the REST API (X-API-Key header)
  apiKey: process.env.HOSTWATCH_API_KEY || '',

  // Telegram integration
  telegramBotToken: process.env.TELEGRAM_BOT_TOKEN || '',
  telegramChatId: process.env.TELEGRAM_CHAT_ID || '',
  telegramListenerEnabled: process.env.TELEGRAM_LISTENER_ENABLED !== 'false', // default true
  telegramSendAttempts: intEnv('TELEGRAM_SEND_ATTEMPTS', 3),
  telegramRetryDelayMs: intEnv('TELEGRAM_RETRY_DELAY_MS', 2000),

  // Polling
  monitorPollIntervalMs: intEnv('MONITOR_POLL_INTERVAL_MS', 30000),
  eventsPollIntervalMs: intEnv('EVENTS_POLL_INTERVAL_MS', 30000),
  startupDelayMs: intEnv('MONITOR_STARTUP_DELAY_MS', 2000),
  cpuSampleWindowMs: intEnv('CPU_SAMPLE_WINDOW_MS', 1000),

  // Host paths (the agent usually runs in a container with the host mounted)
  authLogPath: process.env.AUTH_LOG_PATH || '/host/var/log/auth.log',
  thermalPath: process.env.THERMAL_PATH || '/sys/class/thermal',
  procPath: process.env.PROC_PATH || '/proc',
  hostLabel: process.env.HOST_LABEL || '',
} as const;
