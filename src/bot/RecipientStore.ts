/**
 * Recipient Store
 *
 * Set of chat ids allowed to receive notifications, persisted as a JSON array.
 * The file is read once at construction and rewritten in full on every change.
 * I/O failures are logged and never reach the caller.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import path from 'path';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { RecipientId } from './types.js';

export class RecipientStore {
  private recipients: Set<RecipientId>;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.recipients = this.load();
  }

  get size(): number {
    return this.recipients.size;
  }

  /**
   * Read the persisted recipients. Returns an empty set on any failure.
   */
  public load(): Set<RecipientId> {
    if (!existsSync(this.filePath)) {
      logger.debug('No authorized recipients file', { path: this.filePath });
      return new Set();
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      if (!Array.isArray(parsed)) {
        logger.error('Authorized recipients file is not a JSON array', { path: this.filePath });
        return new Set();
      }

      const recipients = new Set<RecipientId>();
      for (const entry of parsed) {
        if (typeof entry === 'number' && Number.isSafeInteger(entry)) {
          recipients.add(entry);
        } else {
          logger.warn('Skipping invalid recipient entry', { entry });
        }
      }

      logger.info('Authorized recipients loaded', { count: recipients.size });
      return recipients;
    } catch (error) {
      logger.error('Failed to load authorized recipients', {
        path: this.filePath,
        error: errorMessage(error),
      });
      return new Set();
    }
  }

  /**
   * Add a recipient and persist the whole set.
   * Returns false when the recipient was already present.
   */
  public add(chatId: RecipientId): boolean {
    const isNew = !this.recipients.has(chatId);
    this.recipients.add(chatId);
    this.persist();
    return isNew;
  }

  public has(chatId: RecipientId): boolean {
    return this.recipients.has(chatId);
  }

  /**
   * Forget every recipient and remove the backing file
   */
  public clearAndPersist(): void {
    this.recipients = new Set();

    try {
      rmSync(this.filePath, { force: true });
    } catch (error) {
      logger.error('Failed to remove authorized recipients file', {
        path: this.filePath,
        error: errorMessage(error),
      });
    }
  }

  public snapshot(): ReadonlySet<RecipientId> {
    return new Set(this.recipients);
  }

  private persist(): void {
    try {
      mkdirSync(path.dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify([...this.recipients]));
    } catch (error) {
      logger.error('Failed to save authorized recipients', {
        path: this.filePath,
        error: errorMessage(error),
      });
    }
  }
}
