/**
 * Bot Listener
 *
 * Runs long polling as a detached task; HTTP handlers never wait on it.
 * The task checks a stop flag on every tick; shutdown waits for it with an upper bound.
 * A startup failure (bad token) is logged as critical and the task ends without restart.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { sleep } from './timing.js';
import type { AuthorizationFlow } from './AuthorizationFlow.js';
import type {
  AuthorizationOutcome,
  BotIdentity,
  BotListenerOptions,
  InboundMessage,
  RecipientId,
  UpdateSource,
} from './types.js';

interface BotListenerEventTypes {
  started: [BotIdentity];
  handled: [RecipientId, AuthorizationOutcome];
  crashed: [Error];
  stopped: [];
}

export class BotListener extends EventEmitter<BotListenerEventTypes> {
  private task: Promise<void> | null = null;
  private stopRequested = false;

  constructor(
    private readonly source: UpdateSource,
    private readonly flow: AuthorizationFlow,
    private readonly options: BotListenerOptions
  ) {
    super();
  }

  public isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Start the listener without waiting for it
   */
  public runInBackground(): void {
    if (this.task) {
      logger.warn('Bot listener is already running');
      return;
    }

    this.stopRequested = false;
    this.task = this.run().finally(() => {
      this.task = null;
    });
    logger.info('Bot listener started in background');
  }

  /**
   * Request a stop and wait for the listener.
   * Returns false if it did not finish within the shutdown timeout.
   */
  public async shutdown(): Promise<boolean> {
    this.stopRequested = true;

    const task = this.task;
    if (!task) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.options.shutdownTimeoutMs);
    });

    const finished = await Promise.race([task.then(() => true), timedOut]);
    clearTimeout(timer);

    if (finished) {
      logger.info('Bot listener finished');
    } else {
      logger.warn('Bot listener did not stop in time, continuing shutdown', {
        timeoutMs: this.options.shutdownTimeoutMs,
      });
    }
    return finished;
  }

  /**
   * Route one inbound message through the authorization flow and reply
   */
  public async handleMessage(message: InboundMessage): Promise<void> {
    if (message.text === undefined) {
      return;
    }

    const outcome = this.flow.handle(message.chatId, message.text);
    this.emit('handled', message.chatId, outcome);

    if (outcome.type === 'ignored') {
      return;
    }

    const result = await this.source.sendMessage(message.chatId, outcome.reply);
    if (!result.ok) {
      logger.warn('Failed to send bot reply', {
        chatId: message.chatId,
        reason: result.reason,
        error: result.error,
      });
    }
  }

  private async run(): Promise<void> {
    let polling = false;

    try {
      const identity = await this.source.verifyConnection();

      await this.source.startPolling({
        onMessage: (message) => this.handleMessage(message),
        onPollingError: (error) => {
          logger.error('Telegram polling error', { error: error.message });
        },
      });
      polling = true;

      logger.info('Bot is running', { username: identity.username });
      this.emit('started', identity);

      while (!this.stopRequested) {
        await sleep(this.options.stopCheckIntervalMs);
      }
    } catch (error) {
      logger.error('Critical bot listener failure', { error: errorMessage(error) });
      this.emit('crashed', error instanceof Error ? error : new Error(String(error)));
    } finally {
      if (polling) {
        await this.stopPolling();
      }
      this.emit('stopped');
    }
  }

  private async stopPolling(): Promise<void> {
    try {
      await this.source.stopPolling();
      logger.info('Bot polling stopped');
    } catch (error) {
      logger.error('Error while stopping bot polling', { error: errorMessage(error) });
    }
  }
}
