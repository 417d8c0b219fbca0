import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError } from './errors.js';

// Load environment variables
dotenvConfig();

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] ?? defaultValue;
  if (value === undefined || value === '') {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnvVar(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvPositiveNumber(env: Env, key: string, defaultValue: number): number {
  const parsed = getEnvNumber(env, key, defaultValue);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Environment variable ${key} must be greater than zero`);
  }
  return parsed;
}

function getEnvInteger(env: Env, key: string, defaultValue?: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    if (defaultValue === undefined) {
      throw new ConfigurationError(`Missing required environment variable: ${key}`);
    }
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`Environment variable ${key} must be an integer`);
  }
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} is out of range`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

// Logging is read eagerly so the logger can be created before the rest of the config
export const loggingConfig = {
  level: process.env.LOG_LEVEL ?? 'info',
  silent: getEnvBoolean(process.env, 'LOG_SILENT', false),
} as const;

/**
 * Read the application configuration.
 * Throws ConfigurationError when a required value is missing or malformed.
 */
export function loadConfig(env: Env = process.env) {
  return {
    // Telegram Configuration
    telegram: {
      botToken: getEnvVar(env, 'TELEGRAM_BOT_TOKEN'),
      adminChatId: getEnvInteger(env, 'TELEGRAM_CHAT_ID'),
      password: getEnvVar(env, 'TELEGRAM_BOT_PASSWORD'),
    },

    // Web Server Configuration
    server: {
      host: getEnvVar(env, 'SERVER_HOST', '0.0.0.0'),
      port: getEnvInteger(env, 'SERVER_PORT', 5000),

      /** Shared key for the admin endpoints; admin routes reject everything when unset */
      adminApiKey: getOptionalEnvVar(env, 'ADMIN_API_KEY'),
    },

    // Form Rate Limit Configuration
    rateLimit: {
      maxRequests: getEnvInteger(env, 'REQUEST_LIMIT', 3),
      windowMs: getEnvPositiveNumber(env, 'REQUEST_WINDOW_SECONDS', 60) * 1000,
    },

    // Storage Configuration
    storage: {
      recipientsFile: getEnvVar(env, 'RECIPIENTS_FILE', 'data/authorized-recipients.json'),
      envFile: getEnvVar(env, 'ENV_FILE', '.env'),
    },

    // Message Configuration
    messages: {
      timeZone: getEnvVar(env, 'TIMEZONE', 'Europe/Moscow'),
    },
  };
}

export type Config = ReturnType<typeof loadConfig>;
