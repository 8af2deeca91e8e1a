/**
 * Telegram polling listener service.
 *
 * Long-polls the Telegram Bot API `getUpdates` endpoint and answers operator
 * commands from the configured chat. Messages from any other chat are ignored.
 *
 * Supports bot commands: /start, /help, /alerts, /ack, /resources
 */

import os from 'node:os';
import type { AlertEvaluator } from '../alerts/evaluator.js';
import type { SettingsProvider } from '../alerts/settings.js';
import { describeSnapshot, formatDuration, formatUptime } from '../alerts/format.js';
import { errorMessage } from '../alerts/errors.js';
import { callTelegram, sendTelegramMessage } from '../clients/telegram.js';
import { buildResources, isProblem, type ResourceOptions } from '../monitor/thresholds.js';
import { formatNetwork, type NetworkSource } from '../monitor/network.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface TelegramUser {
  id: number;
  first_name: string;
  username?: string;
}

interface TelegramChat {
  id: number;
  type: string;
}

interface TelegramMessage {
  message_id: number;
  from?: TelegramUser;
  chat: TelegramChat;
  date: number;
  text?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

export interface ListenerDeps {
  token: string;
  chatId: string;
  evaluator: AlertEvaluator;
  settings: SettingsProvider;
  resourceOptions: ResourceOptions;
  network: NetworkSource;
  /** Host uptime in seconds */
  readUptime?: () => number;
  /** Clock, epoch ms */
  now?: () => number;
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let pollTimer: ReturnType<typeof setTimeout> | null = null;
let offset = 0;
let running = false;

// ---------------------------------------------------------------------------
// Telegram API helpers
// ---------------------------------------------------------------------------

async function getUpdates(token: string): Promise<TelegramUpdate[]> {
  try {
    // Long poll: Telegram holds the connection up to 25s, returns at once on a new message
    const data = await callTelegram<TelegramUpdate[]>(
      token,
      'getUpdates',
      { offset, timeout: 25, allowed_updates: ['message'] },
      35_000,
    );
    if (!data.ok) {
      console.error(`[TelegramListener] getUpdates error: ${data.description}`);
      return [];
    }
    return data.result || [];
  } catch (err) {
    console.error(`[TelegramListener] getUpdates fetch failed: ${errorMessage(err)}`);
    return [];
  }
}

// ---------------------------------------------------------------------------
// Bot command handlers
// ---------------------------------------------------------------------------

const HELP_TEXT = [
  '🖥️ Host monitor bot',
  '',
  'Commands:',
  '/start - Welcome message',
  '/help - Show this help',
  '/alerts - List active alerts',
  '/ack <identity> - Clear an active alert without a recovery notice',
  '/resources - Current readings, uptime and network',
].join('\n');

async function listActiveAlerts(deps: ListenerDeps): Promise<string> {
  const now = (deps.now ?? Date.now)();
  const active = (await deps.evaluator.listRecords()).filter((record) => record.active);
  if (active.length === 0) {
    return '✅ No active alerts';
  }

  const lines = active.map((record) => {
    const detail = record.lastValue ? describeSnapshot(record.lastValue) : record.type;
    const age = record.firstTriggeredAt === null ? '' : ` for ${formatDuration(now - record.firstTriggeredAt)}`;
    return `• ${record.identity}: ${detail}${age}`;
  });
  return [`⚠️ ${active.length} active alert(s):`, ...lines].join('\n');
}

async function acknowledge(deps: ListenerDeps, identity: string): Promise<string> {
  if (!identity) {
    return 'Usage: /ack <identity>, e.g. /ack disk:/';
  }
  const result = await deps.evaluator.reset(identity, (deps.now ?? Date.now)());
  switch (result) {
    case 'reset':
      return `✅ ${identity} cleared`;
    case 'not-active':
      return `${identity} is not active`;
    case 'unknown':
      return `Unknown alert: ${identity}`;
  }
}

async function currentReadings(deps: ListenerDeps): Promise<string> {
  const resources = buildResources(deps.settings.current(), deps.resourceOptions);
  const [results, network] = await Promise.all([
    Promise.allSettled(resources.map((resource) => resource.sample())),
    deps.network.read().then(formatNetwork, (err: unknown) => {
      console.warn(`[TelegramListener] Network reading failed: ${errorMessage(err)}`);
      return '❔ Network: unavailable';
    }),
  ]);

  const readings = results.map((settled, i) => {
    const resource = resources[i];
    if (settled.status === 'rejected') {
      return `❔ ${resource.label}: unavailable`;
    }
    const value = settled.value;
    const marker = isProblem(resource, value) ? '⚠️' : '✅';
    const reading = resource.unit ? `${value.toFixed(1)}${resource.unit}` : (value >= resource.threshold ? 'up' : 'down');
    return `${marker} ${resource.label}: ${reading}`;
  });

  const uptime = `⏱️ Uptime: ${formatUptime((deps.readUptime ?? os.uptime)())}`;
  return [...readings, uptime, '', network].join('\n');
}

/**
 * Reply text for a bot command, or null when the command is unknown.
 */
export async function handleCommand(
  command: string,
  args: string,
  deps: ListenerDeps,
): Promise<string | null> {
  switch (command) {
    case '/start':
      return 'Hello! I report alerts for this host. Type /help to see the commands.';
    case '/help':
      return HELP_TEXT;
    case '/alerts':
      return listActiveAlerts(deps);
    case '/ack':
      return acknowledge(deps, args.trim());
    case '/resources':
      return currentReadings(deps);
    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Message processing
// ---------------------------------------------------------------------------

/**
 * Handle one update. Returns the reply sent, or null when the update was
 * ignored.
 */
export async function handleUpdate(update: TelegramUpdate, deps: ListenerDeps): Promise<string | null> {
  const msg = update.message;
  if (!msg?.text) return null;

  const chatId = msg.chat.id;
  if (String(chatId) !== deps.chatId) {
    console.warn(`[TelegramListener] Ignoring message from unknown chat ${chatId}`);
    return null;
  }

  const text = msg.text.trim();
  if (!text.startsWith('/')) {
    return null;
  }

  const [cmd, ...rest] = text.split(/\s+/);
  const command = cmd.toLowerCase().replace(/@\w+$/, ''); // strip @botname suffix

  let reply: string;
  try {
    reply = (await handleCommand(command, rest.join(' '), deps)) ?? `Unknown command ${command}. Type /help.`;
  } catch (err) {
    console.error(`[TelegramListener] Error handling ${command}: ${errorMessage(err)}`);
    reply = 'Sorry, that command failed. Check the agent logs.';
  }

  const sent = await sendTelegramMessage(deps.token, chatId, reply);
  if (!sent.ok) {
    console.error(`[TelegramListener] Reply failed: ${sent.error}`);
  }
  return reply;
}

// ---------------------------------------------------------------------------
// Poll loop
// ---------------------------------------------------------------------------

async function poll(deps: ListenerDeps): Promise<void> {
  if (!running) return;

  const updates = await getUpdates(deps.token);
  for (const update of updates) {
    // Advance offset past this update even if handling fails
    offset = update.update_id + 1;
    try {
      await handleUpdate(update, deps);
    } catch (err) {
      console.error(`[TelegramListener] Unhandled error in handleUpdate: ${errorMessage(err)}`);
    }
  }

  if (running) {
    // Small gap to avoid a tight loop on errors
    pollTimer = setTimeout(() => {
      poll(deps).catch((err) => console.error(`[TelegramListener] Poll error: ${errorMessage(err)}`));
    }, 500);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function startTelegramListener(deps: ListenerDeps, enabled: boolean): void {
  if (!enabled) {
    console.log('[TelegramListener] Disabled via TELEGRAM_LISTENER_ENABLED=false');
    return;
  }
  if (!deps.token || !deps.chatId) {
    console.log('[TelegramListener] Telegram not configured, skipping');
    return;
  }
  if (running) {
    console.log('[TelegramListener] Already running');
    return;
  }

  running = true;
  offset = 0;
  console.log('[TelegramListener] Starting');
  poll(deps).catch((err) => console.error(`[TelegramListener] Poll error: ${errorMessage(err)}`));
}

export function stopTelegramListener(): void {
  if (!running) return;
  running = false;
  if (pollTimer) {
    clearTimeout(pollTimer);
    pollTimer = null;
  }
  console.log('[TelegramListener] Stopped');
}
