/**
 * Notification dispatcher -- renders decided notifications and hands them to
 * the transport. Delivery happens after the evaluator has committed state, so
 * a failed send is logged and counted but never rolled back or retried here.
 */

import type { AlertNotification, AlertSettings, EventType } from './types.js';
import { DeliveryError, errorMessage } from './errors.js';
import { renderNotification } from './format.js';

// ---------------------------------------------------------------------------
// Transport seam
// ---------------------------------------------------------------------------

export interface SendResult {
  ok: boolean;
  messageId?: number;
  error?: string;
}

export interface NotificationTransport {
  send(text: string): Promise<SendResult>;
}

export interface DispatchResult {
  delivered: boolean;
  text: string;
  error?: DeliveryError;
}

export interface DispatcherStats {
  sent: number;
  failed: number;
}

export interface DispatcherOptions {
  /** Prepended as "[host] " so one chat can serve several machines */
  hostLabel?: string;
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class NotificationDispatcher {
  private sent = 0;
  private failed = 0;

  constructor(
    private readonly transport: NotificationTransport,
    private readonly options: DispatcherOptions = {},
  ) {}

  /** Render and send one lifecycle notification. Never throws. */
  async dispatch(notification: AlertNotification): Promise<DispatchResult> {
    const result = await this.deliver(renderNotification(notification));
    if (result.delivered) {
      console.log(`[Dispatcher] ${notification.action.kind} sent for ${notification.record.identity}`);
    }
    return result;
  }

  /**
   * Send one-shot event text (SSH login, reboot). Returns null when the
   * event type is disabled.
   */
  async announce(type: EventType, text: string, settings: AlertSettings): Promise<DispatchResult | null> {
    if (!settings.enabled) {
      return null;
    }
    const result = await this.deliver(text);
    if (result.delivered) {
      console.log(`[Dispatcher] ${type} event sent`);
    }
    return result;
  }

  /** Send arbitrary text through the transport, e.g. an operator test message. */
  async sendText(text: string): Promise<DispatchResult> {
    return this.deliver(text);
  }

  stats(): DispatcherStats {
    return { sent: this.sent, failed: this.failed };
  }

  private async deliver(body: string): Promise<DispatchResult> {
    const text = this.options.hostLabel ? `[${this.options.hostLabel}] ${body}` : body;

    let outcome: SendResult;
    try {
      outcome = await this.transport.send(text);
    } catch (err) {
      outcome = { ok: false, error: errorMessage(err) };
    }

    if (outcome.ok) {
      this.sent++;
      return { delivered: true, text };
    }

    this.failed++;
    const error = new DeliveryError(outcome.error ?? 'transport reported failure');
    console.error(`[Dispatcher] Delivery failed: ${error.message}`);
    return { delivered: false, text, error };
  }
}
