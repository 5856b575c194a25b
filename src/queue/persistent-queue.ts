import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { PersistenceError, QueueEmptyError, QueueFullError } from '../shared/errors.js';

export interface PersistentQueueOptions<T> {
  dataDir: string;
  filename: string;
  maxSize: number;
  /** Schema each persisted item must satisfy on load. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Human-readable name used in errors and logs. */
  label?: string;
}

/**
 * Bounded FIFO backed by a JSON array file.
 *
 * Every mutation rewrites the file before returning. The in-memory array is
 * authoritative for the lifetime of the process: a failed write is logged and
 * the mutation still stands. All methods are synchronous, so no other task can
 * observe an intermediate state.
 */
export class PersistentQueue<T> {
  protected items: T[];
  readonly filePath: string;
  readonly maxSize: number;
  protected readonly label: string;
  private readonly schema: z.ZodType<T[], z.ZodTypeDef, unknown>;

  constructor(opts: PersistentQueueOptions<T>) {
    this.filePath = join(opts.dataDir, opts.filename);
    this.maxSize = opts.maxSize;
    this.label = opts.label ?? 'queue';
    this.schema = z.array(opts.schema);
    this.items = this.load();
  }

  add(item: T): void {
    if (this.items.length >= this.maxSize) {
      throw new QueueFullError(this.label, this.items.length, this.maxSize);
    }
    this.items.push(item);
    this.save();
  }

  pop(): T {
    const [head] = this.items;
    if (this.items.length === 0 || head === undefined) {
      throw new QueueEmptyError(`${this.label} is empty`);
    }
    this.items = this.items.slice(1);
    this.save();
    return head;
  }

  peek(): T {
    const [head] = this.items;
    if (this.items.length === 0 || head === undefined) {
      throw new QueueEmptyError(`${this.label} is empty`);
    }
    return structuredClone(head);
  }

  size(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.items.length >= this.maxSize;
  }

  /** Snapshot copy; later mutations of the queue do not affect it. */
  list(): T[] {
    return structuredClone(this.items);
  }

  clear(): void {
    this.items = [];
    this.save();
  }

  /**
   * Replace the backing array with `fn(current)`. `fn` receives a copy and
   * must not call back into the queue.
   */
  update(fn: (items: T[]) => T[]): void {
    this.items = fn(structuredClone(this.items));
    this.save();
  }

  findFirst(predicate: (item: T) => boolean): T | null {
    const found = this.items.find(predicate);
    return found === undefined ? null : structuredClone(found);
  }

  findAndRemove(predicate: (item: T) => boolean): T | null {
    const idx = this.items.findIndex(predicate);
    if (idx === -1) return null;
    const [removed] = this.items.splice(idx, 1);
    this.save();
    return removed ?? null;
  }

  private load(): T[] {
    if (!existsSync(this.filePath)) return [];
    try {
      const raw: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      const items = this.schema.parse(raw);
      if (items.length > this.maxSize) {
        logger.warn(`${this.label} file over capacity, dropping extra items`, {
          path: this.filePath,
          loaded: items.length,
          capacity: this.maxSize,
        });
        return items.slice(0, this.maxSize);
      }
      return items;
    } catch (err) {
      logger.warn(`${this.label} file unreadable, starting empty`, {
        path: this.filePath,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  protected save(): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(this.items, null, 2), 'utf8');
    } catch (err) {
      const failure = new PersistenceError(this.filePath, err);
      logger.error(failure.message, { queue: this.label });
    }
  }
}
