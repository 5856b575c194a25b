import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { ReviewerSchema } from '../shared/schemas.js';
import { PersistenceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Reviewer } from './types.js';

export const REVIEWERS_FILE = 'reviewers.json';

const ReviewerListSchema = z.array(ReviewerSchema);

/**
 * Chat ids subscribed to review notifications, persisted as a JSON array.
 * Each change is written to disk before the method returns.
 */
export class ReviewerStore {
  readonly filePath: string;
  private readonly reviewers = new Map<number, Reviewer>();

  constructor(dataDir: string) {
    this.filePath = join(dataDir, REVIEWERS_FILE);
    this.load();
  }

  has(chatId: number): boolean {
    return this.reviewers.has(chatId);
  }

  /** Returns false when the chat was already registered. */
  register(reviewer: Reviewer): boolean {
    if (this.reviewers.has(reviewer.chat_id)) return false;
    this.reviewers.set(reviewer.chat_id, reviewer);
    this.save();
    return true;
  }

  remove(chatId: number): boolean {
    const removed = this.reviewers.delete(chatId);
    this.save();
    return removed;
  }

  list(): Reviewer[] {
    return [...this.reviewers.values()].map((r) => ({ ...r }));
  }

  size(): number {
    return this.reviewers.size;
  }

  private load(): void {
    if (!existsSync(this.filePath)) return;
    try {
      const parsed = ReviewerListSchema.parse(JSON.parse(readFileSync(this.filePath, 'utf8')));
      for (const reviewer of parsed) {
        this.reviewers.set(reviewer.chat_id, reviewer);
      }
      logger.info('Loaded reviewers', { count: this.reviewers.size });
    } catch (err) {
      logger.warn('Reviewers file corrupted, starting empty', {
        path: this.filePath,
        error: errorMessage(err),
      });
    }
  }

  private save(): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(this.list(), null, 2), 'utf8');
    } catch (err) {
      logger.error(new PersistenceError(this.filePath, err).message);
    }
  }
}
