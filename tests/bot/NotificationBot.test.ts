/**
 * Tests for NotificationBot
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { parse } from 'dotenv';
import { EventEmitter } from 'eventemitter3';
import { NotificationBot, PASSWORD_ENV_KEY } from '../../src/bot/NotificationBot.js';
import { BOT_REPLIES } from '../../src/bot/messages.js';
import { ConfigurationError, PersistenceError, ValidationError } from '../../src/errors.js';
import type { NotificationBotConfig } from '../../src/bot/types.js';
import { FakeTelegram } from './fakes.js';

const ADMIN_ID = 1001;

function waitFor(bot: NotificationBot, event: 'listenerStarted' | 'listenerStopped'): Promise<void> {
  return new Promise((resolve) => {
    bot.once(event, () => resolve());
  });
}

describe('NotificationBot', () => {
  let dir: string;
  let config: NotificationBotConfig;
  let telegram: FakeTelegram;
  let secretWriter: { set: Mock };
  let bot: NotificationBot;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'notification-bot-'));
    config = {
      botToken: 'test-token',
      password: 'hunter2',
      adminChatId: ADMIN_ID,
      recipientsFile: path.join(dir, 'recipients.json'),
      envFile: path.join(dir, '.env'),
      stopCheckIntervalMs: 10,
      shutdownTimeoutMs: 1000,
    };
    telegram = new FakeTelegram();
    secretWriter = { set: vi.fn() };
    bot = new NotificationBot(config, { client: telegram, secretWriter });
  });

  afterEach(async () => {
    await bot.shutdown();
    rmSync(dir, { recursive: true, force: true });
  });

  async function startListener(): Promise<void> {
    const started = waitFor(bot, 'listenerStarted');
    bot.runInBackground();
    await started;
  }

  describe('constructor', () => {
    it('should be an event emitter', () => {
      const listener = vi.fn();
      bot.on('passwordUpdated', listener);

      bot.updatePassword('new-secret');

      expect(bot).toBeInstanceOf(EventEmitter);
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should reject an empty token', () => {
      expect(() => new NotificationBot({ ...config, botToken: '' }, { client: telegram })).toThrow(
        ConfigurationError
      );
    });

    it('should reject an empty password', () => {
      expect(() => new NotificationBot({ ...config, password: '' }, { client: telegram })).toThrow(
        ConfigurationError
      );
    });

    it('should reject a non-integer admin chat id', () => {
      expect(() => new NotificationBot({ ...config, adminChatId: 10.5 }, { client: telegram })).toThrow(
        ConfigurationError
      );
    });

    it('should load recipients persisted by a previous run', () => {
      writeFileSync(config.recipientsFile, `[${ADMIN_ID}]`);

      const restarted = new NotificationBot(config, { client: telegram, secretWriter });

      expect(restarted.getStatus().recipients).toBe(1);
    });
  });

  describe('sendMessage', () => {
    it('should return false when nobody is authorized', async () => {
      expect(await bot.sendMessage('hello')).toBe(false);
      expect(telegram.sent).toEqual([]);
    });

    it('should report partial delivery as success', async () => {
      writeFileSync(config.recipientsFile, '[1001, 2002]');
      const seeded = new NotificationBot(config, { client: telegram, secretWriter });
      telegram.results.set(2002, { ok: false, reason: 'api', statusCode: 403, error: 'Forbidden' });
      const delivered = vi.fn();
      seeded.on('delivered', delivered);

      expect(await seeded.sendMessage('hello')).toBe(true);
      expect(delivered).toHaveBeenCalledWith({ recipients: 2, delivered: [1001], failed: [2002] });
    });
  });

  it('should authorize the admin and then deliver notifications', async () => {
    await startListener();

    await telegram.receive(ADMIN_ID, '/start');
    expect(telegram.lastReply()).toBe(BOT_REPLIES.passwordPrompt);

    await telegram.receive(ADMIN_ID, 'hunter2');
    expect(telegram.lastReply()).toBe(BOT_REPLIES.accessGranted);
    expect(bot.getStatus()).toEqual({ listening: true, recipients: 1 });

    telegram.sent = [];
    expect(await bot.sendMessage('hello')).toBe(true);
    expect(telegram.sent).toEqual([{ chatId: ADMIN_ID, text: 'hello' }]);
  });

  it('should emit authorization events', async () => {
    const authorized = vi.fn();
    const failed = vi.fn();
    bot.on('authorized', authorized);
    bot.on('authorizationFailed', failed);
    await startListener();

    await telegram.receive(2002, 'hunter2');
    await telegram.receive(ADMIN_ID, 'wrong');
    await telegram.receive(ADMIN_ID, 'hunter2');
    await telegram.receive(ADMIN_ID, 'hunter2');

    expect(failed.mock.calls).toEqual([
      [2002, 'denied'],
      [ADMIN_ID, 'invalid_password'],
    ]);
    expect(authorized.mock.calls).toEqual([
      [ADMIN_ID, true],
      [ADMIN_ID, false],
    ]);
  });

  describe('updatePassword', () => {
    it('should deauthorize everyone and persist the new secret', async () => {
      writeFileSync(config.recipientsFile, '[1001, 2002]');
      const seeded = new NotificationBot(config, { client: telegram, secretWriter });

      seeded.updatePassword('new-secret');

      expect(seeded.getStatus().recipients).toBe(0);
      expect(existsSync(config.recipientsFile)).toBe(false);
      expect(secretWriter.set).toHaveBeenCalledWith(PASSWORD_ENV_KEY, 'new-secret');
      expect(await seeded.sendMessage('hello')).toBe(false);
    });

    it('should require the new secret to authorize again', async () => {
      await startListener();
      await telegram.receive(ADMIN_ID, 'hunter2');

      bot.updatePassword('new-secret');
      expect(bot.getStatus().recipients).toBe(0);

      await telegram.receive(ADMIN_ID, 'hunter2');
      expect(telegram.lastReply()).toBe(BOT_REPLIES.invalidPassword);
      expect(bot.getStatus().recipients).toBe(0);

      await telegram.receive(ADMIN_ID, 'new-secret');
      expect(telegram.lastReply()).toBe(BOT_REPLIES.accessGranted);
      expect(bot.getStatus().recipients).toBe(1);
    });

    it('should reject an empty password without touching recipients', () => {
      writeFileSync(config.recipientsFile, `[${ADMIN_ID}]`);
      const seeded = new NotificationBot(config, { client: telegram, secretWriter });

      expect(() => seeded.updatePassword('')).toThrow(ValidationError);
      expect(() => seeded.updatePassword('two\nlines')).toThrow(ValidationError);
      expect(seeded.getStatus().recipients).toBe(1);
      expect(secretWriter.set).not.toHaveBeenCalled();
    });

    it('should reject a password the env file cannot hold before changing anything', async () => {
      writeFileSync(config.recipientsFile, `[${ADMIN_ID}]`);
      writeFileSync(config.envFile, 'TELEGRAM_BOT_PASSWORD=hunter2\n');
      const withEnvFile = new NotificationBot(config, { client: telegram });

      expect(() => withEnvFile.updatePassword('a\'b"c`d')).toThrow(ValidationError);

      expect(withEnvFile.getStatus().recipients).toBe(1);
      expect(readFileSync(config.envFile, 'utf8')).toBe('TELEGRAM_BOT_PASSWORD=hunter2\n');
      expect(await withEnvFile.sendMessage('hello')).toBe(true);
    });

    it('should raise when the secret cannot be persisted', () => {
      const failure = new PersistenceError('disk full', config.envFile);
      secretWriter.set.mockImplementation(() => {
        throw failure;
      });

      expect(() => bot.updatePassword('new-secret')).toThrow(failure);
    });

    it('should write the secret to the env file by default', () => {
      writeFileSync(config.envFile, 'TELEGRAM_BOT_TOKEN=test-token\nTELEGRAM_BOT_PASSWORD=hunter2\n');
      const withEnvFile = new NotificationBot(config, { client: telegram });

      withEnvFile.updatePassword('new-secret');

      const parsed = parse(readFileSync(config.envFile, 'utf8'));
      expect(parsed.TELEGRAM_BOT_PASSWORD).toBe('new-secret');
      expect(parsed.TELEGRAM_BOT_TOKEN).toBe('test-token');
    });
  });

  describe('lifecycle', () => {
    it('should stop the listener on shutdown', async () => {
      await startListener();
      const stopped = waitFor(bot, 'listenerStopped');

      expect(await bot.shutdown()).toBe(true);
      await stopped;

      expect(telegram.polling).toBe(false);
      expect(bot.getStatus().listening).toBe(false);
    });

    it('should report a listener crash as an error', async () => {
      telegram.verifyError = new Error('ETELEGRAM: 401 Unauthorized');
      const errors = vi.fn();
      bot.on('error', errors);
      const stopped = waitFor(bot, 'listenerStopped');

      bot.runInBackground();
      await stopped;

      expect(errors).toHaveBeenCalledWith(telegram.verifyError);
    });
  });
});
