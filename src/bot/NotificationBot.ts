/**
 * Notification Bot
 *
 * Owns the recipient store, the secret and the listener task, and exposes
 * the two operations the web layer calls: sendMessage and updatePassword.
 * Constructed once at startup and passed to the web server.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { ConfigurationError, ValidationError, errorMessage } from '../errors.js';
import { RecipientStore } from './RecipientStore.js';
import { AuthorizationFlow } from './AuthorizationFlow.js';
import { Notifier } from './Notifier.js';
import { BotListener } from './BotListener.js';
import { TelegramClient } from './TelegramClient.js';
import { EnvFileWriter, quoteEnvValue } from './EnvFileWriter.js';
import type {
  BotStatus,
  NotificationBotConfig,
  NotificationBotEvents,
  SecretWriter,
  UpdateSource,
} from './types.js';

export interface NotificationBotDependencies {
  client?: UpdateSource;
  secretWriter?: SecretWriter;
}

export const PASSWORD_ENV_KEY = 'TELEGRAM_BOT_PASSWORD';

const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const DEFAULT_STOP_CHECK_INTERVAL_MS = 1000;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

function validateConfig(config: NotificationBotConfig): void {
  if (typeof config.botToken !== 'string' || config.botToken.trim() === '') {
    throw new ConfigurationError('Invalid bot token');
  }
  if (typeof config.password !== 'string' || config.password === '') {
    throw new ConfigurationError('Invalid bot password');
  }
  if (!Number.isSafeInteger(config.adminChatId)) {
    throw new ConfigurationError('Admin chat id must be an integer');
  }
}

export function validateSecret(secret: string): void {
  if (secret === '') {
    throw new ValidationError('Password must not be empty');
  }
  if (/[\r\n]/.test(secret)) {
    throw new ValidationError('Password must be a single line');
  }
  if (quoteEnvValue(secret) === null) {
    throw new ValidationError('Password cannot contain all of the quote characters \' ` "');
  }
}

export class NotificationBot extends EventEmitter<NotificationBotEvents> {
  private readonly store: RecipientStore;
  private readonly flow: AuthorizationFlow;
  private readonly notifier: Notifier;
  private readonly listener: BotListener;
  private readonly secretWriter: SecretWriter;

  constructor(config: NotificationBotConfig, dependencies: NotificationBotDependencies = {}) {
    super();
    validateConfig(config);

    const client =
      dependencies.client ??
      new TelegramClient({
        botToken: config.botToken,
        requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        pollingIntervalMs: 300,
        pollingTimeoutSeconds: 10,
      });

    this.store = new RecipientStore(config.recipientsFile);
    this.flow = new AuthorizationFlow(this.store, config.adminChatId, config.password);
    this.notifier = new Notifier(this.store, client);
    this.listener = new BotListener(client, this.flow, {
      stopCheckIntervalMs: config.stopCheckIntervalMs ?? DEFAULT_STOP_CHECK_INTERVAL_MS,
      shutdownTimeoutMs: config.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    });
    this.secretWriter = dependencies.secretWriter ?? new EnvFileWriter(config.envFile);

    this.forwardListenerEvents();

    logger.info('Notification bot initialized', {
      adminChatId: config.adminChatId,
      recipients: this.store.size,
    });
  }

  /**
   * Broadcast to all authorized recipients.
   * True when at least one recipient got the message; false when none are authorized.
   */
  public async sendMessage(text: string): Promise<boolean> {
    const report = await this.notifier.broadcast(text);
    if (report.recipients > 0) {
      this.emit('delivered', report);
    }
    return report.delivered.length > 0;
  }

  /**
   * Replace the password. Every recipient loses access and must authorize again.
   * Throws ValidationError for an unusable password, PersistenceError when the
   * env file cannot be written.
   */
  public updatePassword(newSecret: string): void {
    validateSecret(newSecret);

    this.flow.setSecret(newSecret);
    this.store.clearAndPersist();

    try {
      this.secretWriter.set(PASSWORD_ENV_KEY, newSecret);
    } catch (error) {
      logger.error('Failed to persist new bot password', { error: errorMessage(error) });
      throw error;
    }

    logger.info('Bot password updated, all recipients deauthorized');
    this.emit('passwordUpdated');
  }

  public runInBackground(): void {
    this.listener.runInBackground();
  }

  /**
   * Stop the listener; resolves false when it outlived the shutdown timeout
   */
  public async shutdown(): Promise<boolean> {
    return this.listener.shutdown();
  }

  public getStatus(): BotStatus {
    return {
      listening: this.listener.isRunning(),
      recipients: this.store.size,
    };
  }

  private forwardListenerEvents(): void {
    this.listener.on('started', (identity) => this.emit('listenerStarted', identity));
    this.listener.on('stopped', () => this.emit('listenerStopped'));
    this.listener.on('crashed', (error) => this.emit('error', error));

    this.listener.on('handled', (chatId, outcome) => {
      switch (outcome.type) {
        case 'granted':
          this.emit('authorized', chatId, outcome.newlyAdded);
          break;
        case 'denied':
        case 'invalid_password':
          this.emit('authorizationFailed', chatId, outcome.type);
          break;
        default:
          break;
      }
    });
  }
}
