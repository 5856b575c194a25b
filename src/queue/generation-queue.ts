import { PersistentQueue } from './persistent-queue.js';
import { GenerationRequestSchema } from '../shared/schemas.js';
import { QueueEmptyError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { GenerationRequest } from './types.js';

export const GENERATION_QUEUE_FILE = 'generation_queue.json';
export const DEFAULT_GENERATION_QUEUE_SIZE = 10;

export type NewGenerationRequest = Pick<GenerationRequest, 'topic' | 'chat_id' | 'autonomous_source'>;

/**
 * User generation requests with a pending -> generating lifecycle.
 *
 * Items left in `generating` by a previous process are demoted to `pending`
 * on load so they are picked up again.
 */
export class GenerationQueue extends PersistentQueue<GenerationRequest> {
  constructor(dataDir: string, maxSize: number = DEFAULT_GENERATION_QUEUE_SIZE) {
    super({
      dataDir,
      filename: GENERATION_QUEUE_FILE,
      maxSize,
      schema: GenerationRequestSchema,
      label: 'generation queue',
    });

    const interrupted = this.items.filter((req) => req.status === 'generating').length;
    if (interrupted > 0) {
      this.items = this.items.map((req): GenerationRequest => ({ ...req, status: 'pending' }));
      this.save();
      logger.info('Recovered interrupted generation requests', { count: interrupted });
    }
  }

  override add(request: NewGenerationRequest): void {
    super.add({
      topic: request.topic,
      chat_id: request.chat_id,
      autonomous_source: request.autonomous_source,
      created_at: new Date().toISOString(),
      status: 'pending',
    });
  }

  /**
   * Claim the oldest pending request, flipping it to `generating`. Requests
   * from a chat that already has one generating are passed over.
   */
  override pop(): GenerationRequest {
    const idx = this.claimableIndex();
    const found = this.items[idx];
    if (idx === -1 || found === undefined) {
      throw new QueueEmptyError('no pending requests');
    }
    const claimed: GenerationRequest = { ...found, status: 'generating' };
    this.items[idx] = claimed;
    this.save();
    return { ...claimed };
  }

  /** Non-throwing pop; null when nothing is pending. */
  tryPop(): GenerationRequest | null {
    return this.claimableIndex() === -1 ? null : this.pop();
  }

  complete(chatId: number): void {
    this.removeGenerating(chatId);
  }

  fail(chatId: number): void {
    this.removeGenerating(chatId);
  }

  isGenerating(): boolean {
    return this.items.some((req) => req.status === 'generating');
  }

  private claimableIndex(): number {
    const busy = new Set(
      this.items.filter((req) => req.status === 'generating').map((req) => req.chat_id),
    );
    return this.items.findIndex((req) => req.status === 'pending' && !busy.has(req.chat_id));
  }

  private removeGenerating(chatId: number): void {
    const removed = this.findAndRemove(
      (req) => req.chat_id === chatId && req.status === 'generating',
    );
    if (!removed) {
      logger.debug('No generating request to remove', { chat_id: chatId });
    }
  }
}
