/**
 * Types for the notification bot
 */

/**
 * Telegram chat id of a notification recipient
 */
export type RecipientId = number;

export type DeliveryFailureReason = 'timeout' | 'api' | 'network';

/**
 * Outcome of a single outbound message
 */
export type DeliveryResult =
  | { ok: true }
  | {
      ok: false;
      reason: DeliveryFailureReason;
      statusCode?: number;
      error: string;
    };

export interface MessageSender {
  sendMessage(chatId: RecipientId, text: string): Promise<DeliveryResult>;
}

/**
 * Inbound chat message, reduced to what authorization needs
 */
export interface InboundMessage {
  chatId: RecipientId;
  text?: string;
}

export interface BotIdentity {
  id: number;
  username?: string;
}

export interface UpdateHandlers {
  onMessage(message: InboundMessage): Promise<void>;
  onPollingError(error: Error): void;
}

/**
 * Long-polling connection to the messaging platform
 */
export interface UpdateSource extends MessageSender {
  /** Resolves with the bot identity, rejects when the credential is invalid */
  verifyConnection(): Promise<BotIdentity>;
  startPolling(handlers: UpdateHandlers): Promise<void>;
  stopPolling(): Promise<void>;
}

/**
 * Durable key/value configuration (the env file)
 */
export interface SecretWriter {
  set(key: string, value: string): void;
}

export type AuthorizationOutcome =
  | { type: 'prompt'; reply: string }
  | { type: 'granted'; reply: string; newlyAdded: boolean }
  | { type: 'denied'; reply: string }
  | { type: 'invalid_password'; reply: string }
  | { type: 'ignored' };

/**
 * Summary of one broadcast
 */
export interface BroadcastReport {
  recipients: number;
  delivered: RecipientId[];
  failed: RecipientId[];
}

export interface NotificationBotConfig {
  botToken: string;
  password: string;
  adminChatId: number;
  recipientsFile: string;
  envFile: string;

  /** Per-recipient send timeout (default 5s) */
  requestTimeoutMs?: number;

  /** How often the listener checks for a stop request (default 1s) */
  stopCheckIntervalMs?: number;

  /** Upper bound on waiting for the listener during shutdown (default 5s) */
  shutdownTimeoutMs?: number;
}

export interface BotListenerOptions {
  stopCheckIntervalMs: number;
  shutdownTimeoutMs: number;
}

export type NotificationBotEvents = {
  listenerStarted: [identity: BotIdentity];
  listenerStopped: [];
  authorized: [chatId: RecipientId, newlyAdded: boolean];
  authorizationFailed: [chatId: RecipientId, reason: 'denied' | 'invalid_password'];
  delivered: [report: BroadcastReport];
  passwordUpdated: [];
  error: [error: Error];
};

export interface BotStatus {
  listening: boolean;
  recipients: number;
}
