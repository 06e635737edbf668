import {
  NotificationChannel,
  SHORT_MESSAGE_MAX_LENGTH,
  URGENT_PREFIX,
} from '@tidings/shared/constants/notification.constants.js';
import { type AppLogger } from '../../lib/logger.js';
import { type Env } from '../../lib/env.js';

// ---------------------------------------------------------------------------
// Channel Adapter contract
// ---------------------------------------------------------------------------

export type SendResult = { success: true } | { success: false; error: string };

export interface ChannelAdapter {
  readonly channel: NotificationChannel;
  /** Who receives messages on this channel; used in failure logs. */
  readonly recipient: string;
  send(text: string): Promise<SendResult>;
}

export type ChannelRegistry = Partial<Record<NotificationChannel, ChannelAdapter>>;

export type FetchLike = (
  input: string,
  init: { method: string; headers: Record<string, string>; body: string },
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** Per-channel rendering for immediate fan-out. */
export function renderForChannel(channel: NotificationChannel, message: string): string {
  switch (channel) {
    case NotificationChannel.PRIMARY_CHAT:
      return `${URGENT_PREFIX}${message}`;
    case NotificationChannel.SHORT_MESSAGE:
      return message.slice(0, SHORT_MESSAGE_MAX_LENGTH);
    case NotificationChannel.LOG_ONLY:
      return message;
  }
}

// ---------------------------------------------------------------------------
// Delivery
// ---------------------------------------------------------------------------

/**
 * Sends through `adapter`, folding a missing adapter or a thrown error into
 * a failed result.
 */
export async function deliver(
  adapter: ChannelAdapter | undefined,
  text: string,
): Promise<SendResult> {
  if (!adapter) {
    return { success: false, error: 'channel not configured' };
  }
  try {
    return await adapter.send(text);
  } catch (err: unknown) {
    return {
      success: false,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

// ---------------------------------------------------------------------------
// Adapters
// ---------------------------------------------------------------------------

async function readFailure(res: {
  status: number;
  text(): Promise<string>;
}): Promise<SendResult> {
  const body = await res.text();
  return { success: false, error: `HTTP ${res.status}: ${body.slice(0, 200)}` };
}

export interface TelegramAdapterOptions {
  botToken: string;
  chatId: string;
  fetchImpl?: FetchLike;
  apiBaseUrl?: string;
}

export function createTelegramAdapter(opts: TelegramAdapterOptions): ChannelAdapter {
  const fetchImpl: FetchLike = opts.fetchImpl ?? fetch;
  const baseUrl = opts.apiBaseUrl ?? 'https://api.telegram.org';

  return {
    channel: NotificationChannel.PRIMARY_CHAT,
    recipient: `telegram:${opts.chatId}`,
    async send(text: string): Promise<SendResult> {
      const res = await fetchImpl(`${baseUrl}/bot${opts.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: opts.chatId, text }),
      });
      if (!res.ok) return readFailure(res);
      return { success: true };
    },
  };
}

export interface SmsGatewayAdapterOptions {
  url: string;
  token: string;
  recipient: string;
  fetchImpl?: FetchLike;
}

export function createSmsGatewayAdapter(opts: SmsGatewayAdapterOptions): ChannelAdapter {
  const fetchImpl: FetchLike = opts.fetchImpl ?? fetch;

  return {
    channel: NotificationChannel.SHORT_MESSAGE,
    recipient: `sms:${opts.recipient}`,
    async send(text: string): Promise<SendResult> {
      const res = await fetchImpl(opts.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${opts.token}`,
        },
        body: JSON.stringify({ to: opts.recipient, body: text }),
      });
      if (!res.ok) return readFailure(res);
      return { success: true };
    },
  };
}

export function createLogOnlyAdapter(logger: AppLogger): ChannelAdapter {
  return {
    channel: NotificationChannel.LOG_ONLY,
    recipient: 'log',
    async send(text: string): Promise<SendResult> {
      logger.info({ channel: NotificationChannel.LOG_ONLY, text }, 'Notification logged');
      return { success: true };
    },
  };
}

/** Adapters for every channel whose credentials are present in `env`. */
export function createChannelRegistry(env: Env, logger: AppLogger): ChannelRegistry {
  const registry: ChannelRegistry = {
    [NotificationChannel.LOG_ONLY]: createLogOnlyAdapter(logger),
  };

  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
    registry[NotificationChannel.PRIMARY_CHAT] = createTelegramAdapter({
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
    });
  } else {
    logger.warn({ channel: NotificationChannel.PRIMARY_CHAT }, 'Channel not configured');
  }

  if (env.SMS_GATEWAY_URL && env.SMS_GATEWAY_TOKEN && env.SMS_RECIPIENT) {
    registry[NotificationChannel.SHORT_MESSAGE] = createSmsGatewayAdapter({
      url: env.SMS_GATEWAY_URL,
      token: env.SMS_GATEWAY_TOKEN,
      recipient: env.SMS_RECIPIENT,
    });
  } else {
    logger.warn({ channel: NotificationChannel.SHORT_MESSAGE }, 'Channel not configured');
  }

  return registry;
}
