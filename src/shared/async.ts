import { CancelledError } from './errors.js';

type Receiver<T> = (value: T) => void;

/**
 * Bounded in-process channel.
 *
 * `trySend` never blocks: it hands the value to a waiting receiver, buffers it
 * when there is room, and otherwise returns false so the caller can drop it.
 * `receive` resolves with the oldest buffered value or waits for the next send.
 */
export class Channel<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly receivers: Array<Receiver<T>> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`invalid channel capacity: ${capacity}`);
    }
  }

  get length(): number {
    return this.buffer.length;
  }

  trySend(value: T): boolean {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return true;
    }
    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push({ value });
    return true;
  }

  receive(signal?: AbortSignal): Promise<T> {
    const head = this.buffer.shift();
    if (head) return Promise.resolve(head.value);
    if (signal?.aborted) return Promise.reject(new CancelledError());

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.receivers.indexOf(receiver);
        if (idx !== -1) this.receivers.splice(idx, 1);
        reject(new CancelledError());
      };
      const receiver: Receiver<T> = (value) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      };
      this.receivers.push(receiver);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Sleep for `ms`, resolving early (without throwing) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Combine an optional caller signal with a request timeout.
 */
export function withTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
