/**
 * Telegram Client
 *
 * Wraps the Telegram Bot API: outbound sendMessage with a per-call timeout,
 * and long polling for inbound messages.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import { errorMessage } from '../errors.js';
import { TimeoutError, withTimeout } from './timing.js';
import type {
  BotIdentity,
  DeliveryResult,
  RecipientId,
  UpdateHandlers,
  UpdateSource,
} from './types.js';

export interface TelegramClientConfig {
  botToken: string;
  requestTimeoutMs: number;
  pollingIntervalMs: number;
  /** Long-poll wait on the Telegram side, in seconds */
  pollingTimeoutSeconds: number;
}

export class TelegramClient implements UpdateSource {
  private bot: TelegramBot;
  private requestTimeoutMs: number;

  constructor(config: TelegramClientConfig) {
    this.bot = new TelegramBot(config.botToken, {
      polling: {
        autoStart: false,
        interval: config.pollingIntervalMs,
        params: { timeout: config.pollingTimeoutSeconds },
      },
    });
    this.requestTimeoutMs = config.requestTimeoutMs;

    logger.info('Telegram client initialized', {
      token: maskSecret(config.botToken),
    });
  }

  /**
   * Send a plain text message. Never throws.
   */
  public async sendMessage(chatId: RecipientId, text: string): Promise<DeliveryResult> {
    try {
      await withTimeout(this.bot.sendMessage(chatId, text), this.requestTimeoutMs);
      return { ok: true };
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { ok: false, reason: 'timeout', error: error.message };
      }

      const statusCode = this.extractStatusCode(error);
      if (statusCode !== undefined) {
        return { ok: false, reason: 'api', statusCode, error: errorMessage(error) };
      }

      return { ok: false, reason: 'network', error: errorMessage(error) };
    }
  }

  /**
   * Verify the bot token by asking Telegram who we are
   */
  public async verifyConnection(): Promise<BotIdentity> {
    const me = await this.bot.getMe();
    logger.info('Telegram bot verified', { username: me.username });
    return { id: me.id, username: me.username };
  }

  public async startPolling(handlers: UpdateHandlers): Promise<void> {
    this.bot.on('message', (message) => {
      handlers
        .onMessage({ chatId: message.chat.id, text: message.text })
        .catch((error: unknown) => {
          logger.error('Failed to handle inbound message', {
            chatId: message.chat.id,
            error: errorMessage(error),
          });
        });
    });
    this.bot.on('polling_error', (error: Error) => handlers.onPollingError(error));

    await this.bot.startPolling();
  }

  public async stopPolling(): Promise<void> {
    try {
      await this.bot.stopPolling();
    } finally {
      this.bot.removeAllListeners('message');
      this.bot.removeAllListeners('polling_error');
    }
  }

  /**
   * HTTP status of a Bot API error response, if the error carries one
   */
  private extractStatusCode(error: unknown): number | undefined {
    if (error && typeof error === 'object' && 'response' in error) {
      const { response } = error;
      if (
        response &&
        typeof response === 'object' &&
        'statusCode' in response &&
        typeof response.statusCode === 'number'
      ) {
        return response.statusCode;
      }
    }
    return undefined;
  }
}
