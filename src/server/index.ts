/**
 * Web Server Module
 */

// Types
export type {
  RateLimitConfig,
  RateLimitResult,
  WebServerConfig,
  NotificationGateway,
  ErrorBody,
  AdminResponse,
} from './types.js';

// Classes
export { WebServer, PAGE_TEXT } from './WebServer.js';
export { RateLimiter } from './RateLimiter.js';
