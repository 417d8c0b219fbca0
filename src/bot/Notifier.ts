/**
 * Notifier
 *
 * Best-effort broadcast to every authorized recipient.
 * Recipients are sent to one after another; a failure is logged and skipped.
 * No retry and no queue: a failed delivery is lost.
 */

import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { RecipientStore } from './RecipientStore.js';
import type { BroadcastReport, DeliveryResult, MessageSender, RecipientId } from './types.js';

export class Notifier {
  constructor(
    private readonly store: RecipientStore,
    private readonly sender: MessageSender
  ) {}

  /**
   * Send to every recipient and report who got the message
   */
  public async broadcast(text: string): Promise<BroadcastReport> {
    const recipients = this.store.snapshot();
    const report: BroadcastReport = {
      recipients: recipients.size,
      delivered: [],
      failed: [],
    };

    if (recipients.size === 0) {
      logger.warn('Attempted to send a message with no authorized recipients');
      return report;
    }

    for (const chatId of recipients) {
      const result = await this.deliver(chatId, text);

      if (result.ok) {
        report.delivered.push(chatId);
        logger.info('Message delivered', { chatId });
      } else {
        report.failed.push(chatId);
        logger.error('Failed to deliver message', {
          chatId,
          reason: result.reason,
          statusCode: result.statusCode,
          error: result.error,
        });
      }
    }

    return report;
  }

  private async deliver(chatId: RecipientId, text: string): Promise<DeliveryResult> {
    try {
      return await this.sender.sendMessage(chatId, text);
    } catch (error) {
      return { ok: false, reason: 'network', error: errorMessage(error) };
    }
  }
}
