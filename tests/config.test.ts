/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

const requiredEnv = {
  TELEGRAM_BOT_TOKEN: 'test-token',
  TELEGRAM_CHAT_ID: '1001',
  TELEGRAM_BOT_PASSWORD: 'hunter2',
};

describe('loadConfig', () => {
  it('should apply defaults for optional values', () => {
    const config = loadConfig(requiredEnv);

    expect(config.telegram).toEqual({
      botToken: 'test-token',
      adminChatId: 1001,
      password: 'hunter2',
    });
    expect(config.server).toEqual({ host: '0.0.0.0', port: 5000, adminApiKey: undefined });
    expect(config.rateLimit).toEqual({ maxRequests: 3, windowMs: 60_000 });
    expect(config.storage).toEqual({
      recipientsFile: 'data/authorized-recipients.json',
      envFile: '.env',
    });
    expect(config.messages.timeZone).toBe('Europe/Moscow');
  });

  it('should read overrides', () => {
    const config = loadConfig({
      ...requiredEnv,
      TELEGRAM_CHAT_ID: '-100123',
      ADMIN_API_KEY: 'test-admin-key',
      SERVER_PORT: '8080',
      REQUEST_LIMIT: '5',
      REQUEST_WINDOW_SECONDS: '30',
    });

    expect(config.telegram.adminChatId).toBe(-100123);
    expect(config.server.adminApiKey).toBe('test-admin-key');
    expect(config.server.port).toBe(8080);
    expect(config.rateLimit).toEqual({ maxRequests: 5, windowMs: 30_000 });
  });

  it.each(['TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHAT_ID', 'TELEGRAM_BOT_PASSWORD'])(
    'should fail when %s is missing',
    (key) => {
      const env: Record<string, string | undefined> = { ...requiredEnv, [key]: undefined };

      expect(() => loadConfig(env)).toThrow(ConfigurationError);
    }
  );

  it('should reject a non-integer chat id', () => {
    expect(() => loadConfig({ ...requiredEnv, TELEGRAM_CHAT_ID: 'admin' })).toThrow(
      'Environment variable TELEGRAM_CHAT_ID must be an integer'
    );
    expect(() => loadConfig({ ...requiredEnv, TELEGRAM_CHAT_ID: '10.5' })).toThrow(ConfigurationError);
  });

  it('should treat an empty admin key as unset', () => {
    expect(loadConfig({ ...requiredEnv, ADMIN_API_KEY: '' }).server.adminApiKey).toBeUndefined();
  });

  it.each(['0', '-30'])('should reject a rate limit window of %s seconds', (value) => {
    expect(() => loadConfig({ ...requiredEnv, REQUEST_WINDOW_SECONDS: value })).toThrow(
      'Environment variable REQUEST_WINDOW_SECONDS must be greater than zero'
    );
  });

  it('should accept a fractional rate limit window', () => {
    expect(loadConfig({ ...requiredEnv, REQUEST_WINDOW_SECONDS: '0.5' }).rateLimit.windowMs).toBe(500);
  });
});
