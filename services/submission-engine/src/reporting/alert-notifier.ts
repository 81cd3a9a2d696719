/**
 * Completion Alerts
 *
 * Turns failed completions into alerts and posts them to the Slack and
 * Discord webhooks named in the engine config.
 *
 * A channel that fails `failureThreshold` times in a row is skipped for
 * `resetTimeoutMs`; the first alert after that window is a trial send.
 */

import type { Alert, AlertSeverity, AlertSink, CompletionEvent, TerminalOutcome } from '@txcore/types';
import { createLogger, getErrorMessage, type ILogger } from '@txcore/core';

const SERVICE_NAME = 'submission-engine';

const COMPLETION_SEVERITY: Record<Exclude<TerminalOutcome, 'confirmed'>, AlertSeverity> = {
  rejected: 'high',
  dropped: 'critical',
  reverted: 'high',
};

const SEVERITY_COLOR: Record<AlertSeverity, number> = {
  critical: 0xff0000,
  high: 0xffa500,
  warning: 0xffff00,
  low: 0x808080,
};

/**
 * Alert for a completion an operator should see. Confirmations and caller
 * cancellations produce none.
 */
export function completionAlert(event: CompletionEvent): Alert | null {
  if (event.outcome === 'confirmed') return null;
  if (event.outcome === 'rejected' && event.reason === 'cancelled') return null;

  const reason = event.reason ? `: ${event.reason}` : '';
  return {
    type: `SUBMISSION_${event.outcome.toUpperCase()}`,
    service: SERVICE_NAME,
    severity: COMPLETION_SEVERITY[event.outcome],
    message: `Request ${event.requestId} on chain ${event.chainId} ${event.outcome}${reason}`,
    data: {
      requestId: event.requestId,
      chainId: event.chainId,
      account: event.account,
      nonce: event.nonce,
      chainTxHandle: event.chainTxHandle,
      detail: event.detail,
    },
    timestamp: event.completedAt,
  };
}

// =============================================================================
// Channels
// =============================================================================

export interface NotificationChannel {
  readonly name: string;
  /** Rejects when the alert was not delivered */
  send(alert: Alert): Promise<void>;
}

export type WebhookPayload = (alert: Alert) => Record<string, unknown>;

function headline(alert: Alert): string {
  return `[${(alert.severity ?? 'low').toUpperCase()}] ${alert.type}`;
}

export const slackPayload: WebhookPayload = alert => ({
  text: headline(alert),
  blocks: [
    { type: 'section', text: { type: 'mrkdwn', text: `*${headline(alert)}*\n${alert.message ?? ''}` } },
    {
      type: 'context',
      elements: [{ type: 'mrkdwn', text: `${alert.service ?? SERVICE_NAME} | ${new Date(alert.timestamp).toISOString()}` }],
    },
  ],
});

export const discordPayload: WebhookPayload = alert => ({
  content: headline(alert),
  embeds: [{
    description: alert.message ?? '',
    color: SEVERITY_COLOR[alert.severity ?? 'low'],
    timestamp: new Date(alert.timestamp).toISOString(),
  }],
});

export class WebhookChannel implements NotificationChannel {
  constructor(
    readonly name: string,
    private readonly url: string,
    private readonly payload: WebhookPayload
  ) {}

  async send(alert: Alert): Promise<void> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(this.payload(alert)),
    });
    if (!response.ok) {
      throw new Error(`${this.name} webhook answered ${response.status} ${response.statusText}`.trimEnd());
    }
  }
}

// =============================================================================
// Notifier
// =============================================================================

export interface ChannelBreakerConfig {
  failureThreshold: number;
  resetTimeoutMs: number;
}

export interface AlertNotifierOptions {
  slackWebhookUrl?: string;
  discordWebhookUrl?: string;
  historySize?: number;
  circuit?: Partial<ChannelBreakerConfig>;
  /** Replaces the webhook channels */
  channels?: NotificationChannel[];
  logger?: ILogger;
}

interface ChannelState {
  channel: NotificationChannel;
  failures: number;
  openedAt: number | null;
}

function webhookChannels(options: AlertNotifierOptions): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (options.slackWebhookUrl) {
    channels.push(new WebhookChannel('slack', options.slackWebhookUrl, slackPayload));
  }
  if (options.discordWebhookUrl) {
    channels.push(new WebhookChannel('discord', options.discordWebhookUrl, discordPayload));
  }
  return channels;
}

export class AlertNotifier implements AlertSink {
  private readonly channels: ChannelState[];
  private readonly breaker: ChannelBreakerConfig;
  private readonly history: Alert[] = [];
  private readonly historySize: number;
  private readonly logger: ILogger;

  constructor(options: AlertNotifierOptions = {}) {
    this.logger = options.logger ?? createLogger('alert-notifier');
    this.historySize = options.historySize ?? 100;
    this.breaker = { failureThreshold: 3, resetTimeoutMs: 60_000, ...options.circuit };
    this.channels = (options.channels ?? webhookChannels(options)).map(channel => ({
      channel,
      failures: 0,
      openedAt: null,
    }));

    if (this.channels.length === 0) {
      this.logger.warn('No alert webhooks configured; alerts are only logged');
    } else {
      this.logger.info('Alert channels configured', { channels: this.channels.map(state => state.channel.name) });
    }
  }

  /**
   * Record the alert and post it to every channel whose circuit is closed.
   * Delivery failures are logged, never thrown.
   */
  async notify(alert: Alert): Promise<void> {
    this.history.push(alert);
    if (this.history.length > this.historySize) {
      this.history.shift();
    }

    if (this.channels.length === 0) {
      this.logger.warn('Alert raised', { type: alert.type, severity: alert.severity, message: alert.message });
      return;
    }

    const now = Date.now();
    const ready = this.channels.filter(state => !this.isOpen(state, now));
    if (ready.length < this.channels.length) {
      this.logger.debug('Skipping alert channels with open circuits', {
        alertType: alert.type,
        channels: this.channels.filter(state => !ready.includes(state)).map(state => state.channel.name),
      });
    }

    const results = await Promise.allSettled(ready.map(state => state.channel.send(alert)));
    results.forEach((result, index) => {
      const state = ready[index];
      if (result.status === 'fulfilled') {
        if (state.openedAt !== null) {
          this.logger.info('Alert channel recovered', { channel: state.channel.name });
        }
        state.failures = 0;
        state.openedAt = null;
        return;
      }

      state.failures++;
      this.logger.error('Alert notification failed', {
        channel: state.channel.name,
        alertType: alert.type,
        error: getErrorMessage(result.reason),
      });
      if (state.failures >= this.breaker.failureThreshold) {
        if (state.openedAt === null) {
          this.logger.warn('Alert channel circuit opened', {
            channel: state.channel.name,
            failures: state.failures,
            resetTimeoutMs: this.breaker.resetTimeoutMs,
          });
        }
        state.openedAt = now;
      }
    });
  }

  /**
   * Most recent alerts first.
   */
  getAlertHistory(limit = 100): Alert[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit).reverse();
  }

  private isOpen(state: ChannelState, now: number): boolean {
    return state.openedAt !== null && now - state.openedAt < this.breaker.resetTimeoutMs;
  }
}
