/**
 * Application
 *
 * Wires the notification bot and the web server:
 * Web forms → Notification Bot → Telegram admin chat
 */

import { logger } from './logger.js';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { NotificationBot } from './bot/index.js';
import { WebServer } from './server/index.js';

export class App {
  private config: Config;
  private bot: NotificationBot;
  private webServer: WebServer;
  private isRunning = false;

  constructor(config: Config = loadConfig()) {
    this.config = config;

    // Initialize Notification Bot
    this.bot = new NotificationBot({
      botToken: config.telegram.botToken,
      password: config.telegram.password,
      adminChatId: config.telegram.adminChatId,
      recipientsFile: config.storage.recipientsFile,
      envFile: config.storage.envFile,
    });

    // Initialize Web Server
    this.webServer = new WebServer(
      {
        host: config.server.host,
        port: config.server.port,
        adminApiKey: config.server.adminApiKey,
        rateLimit: config.rateLimit,
        timeZone: config.messages.timeZone,
      },
      this.bot
    );

    this.setupBotEvents();
  }

  private setupBotEvents(): void {
    this.bot.on('listenerStarted', (identity) => {
      logger.info('Bot listener is up', { username: identity.username });
    });

    this.bot.on('listenerStopped', () => {
      logger.info('Bot listener stopped');
    });

    this.bot.on('authorized', (chatId, newlyAdded) => {
      logger.info('Chat authorized for notifications', { chatId, newlyAdded });
    });

    this.bot.on('authorizationFailed', (chatId, reason) => {
      logger.warn('Chat authorization rejected', { chatId, reason });
    });

    this.bot.on('delivered', (report) => {
      logger.debug('Broadcast finished', {
        recipients: report.recipients,
        delivered: report.delivered.length,
        failed: report.failed.length,
      });
    });

    this.bot.on('passwordUpdated', () => {
      logger.info('Bot password rotated');
    });

    this.bot.on('error', (error) => {
      logger.error('Notification bot error', { error: error.message });
    });
  }

  /**
   * Start the application
   */
  public async start(): Promise<void> {
    logger.info('Starting storefront notifier', {
      host: this.config.server.host,
      port: this.config.server.port,
      adminChatId: this.config.telegram.adminChatId,
    });

    // The listener runs detached; the server does not wait for Telegram
    this.bot.runInBackground();

    await this.webServer.start();

    this.isRunning = true;
    logger.info('Storefront notifier started successfully');
  }

  /**
   * Stop the application gracefully
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;

    logger.info('Stopping storefront notifier', { reason });
    this.isRunning = false;

    await this.webServer.stop();
    await this.bot.shutdown();

    logger.info('Storefront notifier stopped successfully');
  }

  public getStatus(): { isRunning: boolean; listening: boolean; recipients: number } {
    return {
      isRunning: this.isRunning,
      ...this.bot.getStatus(),
    };
  }
}
