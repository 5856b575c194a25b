/**
 * Error kinds surfaced by the control plane.
 *
 * Queue errors are local signals; transport, producer and publisher errors
 * wrap failures of external collaborators; CancelledError is raised by every
 * waiter when its AbortSignal fires.
 */

export class QueueFullError extends Error {
  readonly size: number;
  readonly capacity: number;

  constructor(label: string, size: number, capacity: number) {
    super(`${label} is full (${size}/${capacity})`);
    this.name = 'QueueFullError';
    this.size = size;
    this.capacity = capacity;
  }
}

export class QueueEmptyError extends Error {
  constructor(message = 'queue is empty') {
    super(message);
    this.name = 'QueueEmptyError';
  }
}

export class TransportError extends Error {
  readonly method: string;
  readonly status?: number;

  constructor(method: string, message: string, status?: number) {
    super(`telegram ${method} failed: ${message}`);
    this.name = 'TransportError';
    this.method = method;
    this.status = status;
  }
}

export class ProducerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProducerError';
  }
}

export class PublisherError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'PublisherError';
    this.status = status;
  }
}

export class PersistenceError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`persist ${path}: ${errorMessage(cause)}`);
    this.name = 'PersistenceError';
    this.path = path;
  }
}

export class CancelledError extends Error {
  constructor(message = 'operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isCancelled(err: unknown): err is CancelledError {
  return err instanceof CancelledError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
