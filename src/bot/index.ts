export { NotificationBot, PASSWORD_ENV_KEY, validateSecret } from './NotificationBot.js';
export { RecipientStore } from './RecipientStore.js';
export { AuthorizationFlow, parseCommand } from './AuthorizationFlow.js';
export { Notifier } from './Notifier.js';
export { BotListener } from './BotListener.js';
export { TelegramClient } from './TelegramClient.js';
export { EnvFileWriter, quoteEnvValue } from './EnvFileWriter.js';
export { BOT_REPLIES } from './messages.js';
export type {
  RecipientId,
  DeliveryResult,
  MessageSender,
  InboundMessage,
  BotIdentity,
  UpdateHandlers,
  UpdateSource,
  SecretWriter,
  AuthorizationOutcome,
  BroadcastReport,
  NotificationBotConfig,
  NotificationBotEvents,
  BotStatus,
} from './types.js';
export type { NotificationBotDependencies } from './NotificationBot.js';
