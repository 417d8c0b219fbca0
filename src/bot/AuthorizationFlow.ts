/**
 * Authorization Flow
 *
 * Password-gated opt-in for notifications. Every message is checked on its own;
 * there is no session. Only the configured admin chat can ever be authorized.
 */

import { logger } from '../logger.js';
import { secureCompare } from '../secureCompare.js';
import { BOT_REPLIES } from './messages.js';
import type { RecipientStore } from './RecipientStore.js';
import type { AuthorizationOutcome, RecipientId } from './types.js';

// "/start", "/start@SomeBot", "/start payload"
const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s|$)/;

export function parseCommand(text: string): string | null {
  const match = COMMAND_PATTERN.exec(text);
  return match ? match[1].toLowerCase() : null;
}

export class AuthorizationFlow {
  private secret: string;

  constructor(
    private readonly store: RecipientStore,
    private readonly adminChatId: RecipientId,
    secret: string
  ) {
    this.secret = secret;
  }

  /**
   * Decide what to do with an inbound text message
   */
  public handle(chatId: RecipientId, text: string): AuthorizationOutcome {
    const command = parseCommand(text);
    if (command === 'start') {
      logger.info('Received /start', { chatId });
      return { type: 'prompt', reply: BOT_REPLIES.passwordPrompt };
    }
    if (command !== null) {
      return { type: 'ignored' };
    }

    return this.verify(chatId, text);
  }

  public setSecret(secret: string): void {
    this.secret = secret;
  }

  public matchesSecret(text: string): boolean {
    return secureCompare(text, this.secret);
  }

  private verify(chatId: RecipientId, text: string): AuthorizationOutcome {
    // Admin check comes first: the right password from anyone else is still denied
    if (chatId !== this.adminChatId) {
      return { type: 'denied', reply: BOT_REPLIES.accessDenied };
    }

    if (!this.matchesSecret(text)) {
      logger.warn('Failed login attempt', { chatId });
      return { type: 'invalid_password', reply: BOT_REPLIES.invalidPassword };
    }

    const newlyAdded = this.store.add(chatId);
    logger.info('Recipient authorized', { chatId, newlyAdded });
    return { type: 'granted', reply: BOT_REPLIES.accessGranted, newlyAdded };
  }
}
