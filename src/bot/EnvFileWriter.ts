/**
 * Env File Writer
 *
 * Sets one KEY=value line in a dotenv file, keeping every other line as is.
 * The value is quoted so that dotenv reads it back unchanged.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { PersistenceError, errorMessage } from '../errors.js';
import type { SecretWriter } from './types.js';

const QUOTES = ["'", '`', '"'] as const;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function quoteEnvValue(value: string): string | null {
  if (/[\r\n]/.test(value)) {
    return null;
  }
  // Double quotes last: dotenv expands \n inside them
  const quote = QUOTES.find((q) => !value.includes(q) && (q !== '"' || !value.includes('\\n')));
  return quote === undefined ? null : `${quote}${value}${quote}`;
}

export class EnvFileWriter implements SecretWriter {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  /**
   * Replace the line for `key`, or append one. Throws PersistenceError on failure.
   */
  public set(key: string, value: string): void {
    const quoted = quoteEnvValue(value);
    if (quoted === null) {
      throw new PersistenceError(`Value for ${key} cannot be written to an env file`, this.filePath);
    }

    const entry = `${key}=${quoted}`;
    const pattern = new RegExp(`^\\s*(?:export\\s+)?${escapeRegExp(key)}\\s*=`);

    try {
      const content = existsSync(this.filePath) ? readFileSync(this.filePath, 'utf8') : '';
      const lines = content.length > 0 ? content.replace(/\r?\n$/, '').split(/\r?\n/) : [];

      const index = lines.findIndex((line) => pattern.test(line));
      if (index >= 0) {
        lines[index] = entry;
      } else {
        lines.push(entry);
      }

      writeFileSync(this.filePath, `${lines.join('\n')}\n`);
    } catch (error) {
      throw new PersistenceError(
        `Failed to write ${key} to ${this.filePath}: ${errorMessage(error)}`,
        this.filePath
      );
    }
  }
}
