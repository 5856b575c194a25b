import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GenerationQueue, GENERATION_QUEUE_FILE } from '../queue/generation-queue.js';
import { QueueEmptyError, QueueFullError } from '../shared/errors.js';
import type { GenerationRequest } from '../queue/types.js';

describe('GenerationQueue', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'reelroom-gen-queue-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('adds requests as pending and claims them in order', () => {
    const q = new GenerationQueue(tmpDir);
    q.add({ topic: 'cats', chat_id: 1, autonomous_source: false });
    q.add({ topic: '', chat_id: 2, autonomous_source: true });

    const claimed = q.pop();
    expect(claimed).toMatchObject({ topic: 'cats', chat_id: 1, status: 'generating' });
    expect(q.isGenerating()).toBe(true);
    expect(q.size()).toBe(2);
    expect(q.list().map((r) => r.status)).toEqual(['generating', 'pending']);
  });

  it('throws when nothing is pending', () => {
    const q = new GenerationQueue(tmpDir);
    expect(() => q.pop()).toThrow(QueueEmptyError);
    expect(q.tryPop()).toBeNull();

    q.add({ topic: 'cats', chat_id: 1, autonomous_source: false });
    q.pop();
    expect(() => q.pop()).toThrow('no pending requests');
  });

  it('never runs two requests from the same chat at once', () => {
    const q = new GenerationQueue(tmpDir);
    q.add({ topic: 'first', chat_id: 7, autonomous_source: false });
    q.add({ topic: 'second', chat_id: 7, autonomous_source: false });
    q.add({ topic: 'other', chat_id: 8, autonomous_source: false });

    expect(q.pop().topic).toBe('first');
    // chat 7 is busy, so chat 8's request is claimed next
    expect(q.pop().topic).toBe('other');
    expect(q.tryPop()).toBeNull();

    q.complete(7);
    expect(q.pop().topic).toBe('second');
  });

  it('complete and fail remove the generating request and are idempotent', () => {
    const q = new GenerationQueue(tmpDir);
    q.add({ topic: 'a', chat_id: 1, autonomous_source: false });
    q.add({ topic: 'b', chat_id: 2, autonomous_source: false });
    q.pop();

    q.complete(1);
    q.complete(1);
    expect(q.list().map((r) => r.topic)).toEqual(['b']);

    // chat 2 is only pending, so fail leaves it alone
    q.fail(2);
    expect(q.size()).toBe(1);

    q.pop();
    q.fail(2);
    q.fail(2);
    expect(q.size()).toBe(0);
  });

  it('rejects requests beyond capacity', () => {
    const q = new GenerationQueue(tmpDir, 1);
    q.add({ topic: 'a', chat_id: 1, autonomous_source: false });
    expect(q.isFull()).toBe(true);
    expect(() => q.add({ topic: 'b', chat_id: 2, autonomous_source: false })).toThrow(QueueFullError);
  });

  it('demotes interrupted requests to pending on restart', () => {
    const saved: GenerationRequest[] = [
      { topic: 'X', chat_id: 9, autonomous_source: false, created_at: '2024-01-01T00:00:00.000Z', status: 'generating' },
      { topic: 'Y', chat_id: 10, autonomous_source: false, created_at: '2024-01-01T00:01:00.000Z', status: 'pending' },
    ];
    writeFileSync(join(tmpDir, GENERATION_QUEUE_FILE), JSON.stringify(saved), 'utf8');

    const q = new GenerationQueue(tmpDir);
    expect(q.list().map((r) => r.status)).toEqual(['pending', 'pending']);
    expect(q.isGenerating()).toBe(false);

    const onDisk = JSON.parse(readFileSync(join(tmpDir, GENERATION_QUEUE_FILE), 'utf8')) as GenerationRequest[];
    expect(onDisk.map((r) => r.status)).toEqual(['pending', 'pending']);

    expect(q.pop().topic).toBe('X');
  });
});
