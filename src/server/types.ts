/**
 * Web Server Types
 */

import type { BotStatus } from '../bot/types.js';

export interface RateLimitConfig {
  /** Maximum requests allowed in the window */
  maxRequests: number;
  /** Window size in milliseconds */
  windowMs: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: number;
}

export interface WebServerConfig {
  host: string;
  port: number;
  /** Shared key for admin routes; when unset every admin request is rejected */
  adminApiKey?: string;
  rateLimit: RateLimitConfig;
  /** Time zone for timestamps in notifications */
  timeZone: string;
  /** Directory with the static pages (defaults to ./public at the project root) */
  publicDir?: string;
}

/**
 * What the web layer needs from the notification bot
 */
export interface NotificationGateway {
  sendMessage(text: string): Promise<boolean>;
  updatePassword(newSecret: string): void;
  getStatus(): BotStatus;
}

export interface ErrorBody {
  error: string;
}

export interface AdminResponse {
  status: 'success' | 'error';
  message: string;
}
