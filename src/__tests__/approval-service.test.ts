import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ApprovalService, type ApprovalServiceOptions } from '../approval/service.js';
import { HELP_TEXT } from '../approval/messages.js';
import { approvalKeyboard, type Update } from '../telegram/types.js';
import { CancelledError } from '../shared/errors.js';
import type { NewQueuedVideo } from '../queue/video-queue.js';
import { FakeTransport, flushPromises } from './test-helpers.js';

const ADMIN = 999;

function video(title: string, overrides: Partial<NewQueuedVideo> = {}): NewQueuedVideo {
  return { video_path: `/v/${title}.mp4`, title, script: `${title} script`, tags: [], ...overrides };
}

function command(updateId: number, chatId: number, text: string): Update {
  return {
    update_id: updateId,
    message: {
      message_id: updateId,
      chat: { id: chatId },
      from: { id: chatId, first_name: 'Sam' },
      text,
    },
  };
}

function callback(data: string, chatId: number, messageId?: number): Update {
  return {
    update_id: 1,
    callback_query: {
      id: `cb-${data}`,
      from: { id: chatId, first_name: 'Sam' },
      data,
      message: messageId === undefined ? undefined : { message_id: messageId, chat: { id: chatId } },
    },
  };
}

describe('ApprovalService', () => {
  let tmpDir: string;
  let transport: FakeTransport;

  function service(opts: Partial<ApprovalServiceOptions> = {}): ApprovalService {
    return new ApprovalService({ transport, dataDir: tmpDir, pollRetryMs: 5, ...opts });
  }

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'reelroom-approval-'));
    transport = new FakeTransport();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('presentation', () => {
    it('presents a queued video to the admin chat', async () => {
      const svc = service({ adminChatId: ADMIN });

      await svc.queueVideo(video('T1', { video_path: '/v/1.mp4' }));

      expect(transport.videos()).toEqual([
        {
          kind: 'video',
          chatId: ADMIN,
          path: '/v/1.mp4',
          caption: '*T1*\n\n📹 Video 1/5 remaining in queue',
          keyboard: approvalKeyboard(),
        },
      ]);
      expect(svc.pendingVideo).toMatchObject({ title: 'T1', chat_id: ADMIN, message_id: 100 });
      expect(svc.queue.size()).toBe(0);
    });

    it('sends the preview clip with its duration when there is one', async () => {
      const svc = service({ adminChatId: ADMIN, previewDurationS: 20 });

      await svc.queueVideo(video('T1', { preview_path: '/v/1_preview.mp4' }));

      const [sent] = transport.videos();
      expect(sent?.path).toBe('/v/1_preview.mp4');
      expect(sent?.caption).toBe('*T1*\n\n📹 Video 1/5 remaining in queue\n\n⏱ Preview (20s)');
    });

    it('keeps later videos queued while one is under review', async () => {
      const svc = service({ adminChatId: ADMIN });

      await svc.queueVideo(video('T1'));
      await svc.queueVideo(video('T2'));

      expect(transport.videos()).toHaveLength(1);
      expect(svc.pendingVideo?.title).toBe('T1');
      expect(svc.queue.list().map((v) => v.title)).toEqual(['T2']);
    });

    it('puts the video back at the tail when the send fails', async () => {
      const svc = service({ adminChatId: ADMIN });
      transport.failVideo = true;

      await svc.queueVideo(video('T1'));

      expect(svc.pendingVideo).toBeNull();
      expect(svc.queue.list().map((v) => v.title)).toEqual(['T1']);
    });

    it('tells reviewers about new videos when no admin chat is set', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 7, '/review'));
      expect(transport.messagesTo(7)).toEqual(['Registered as reviewer.', 'No videos in queue.']);
      transport.reset();

      await svc.queueVideo(video('T1'));

      expect(transport.videos()).toHaveLength(0);
      expect(transport.messagesTo(7)).toEqual(['📹 New video queued (1/5 in queue)\n\nType /review to review.']);

      await svc.handleUpdate(command(2, 7, '/review'));
      expect(transport.videos()).toHaveLength(1);
      expect(transport.videos()[0]?.chatId).toBe(7);
      expect(svc.pendingVideo?.title).toBe('T1');
    });
  });

  describe('verdicts', () => {
    it('records a rejection and clears the slot when the verdict is consumed', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));
      transport.reset();

      await svc.handleUpdate(callback('reject', ADMIN, 100));

      expect(transport.calls).toEqual([
        { kind: 'answer', callbackId: 'cb-reject', text: '' },
        { kind: 'markup', chatId: ADMIN, messageId: 100, keyboard: undefined },
        { kind: 'caption', chatId: ADMIN, messageId: 100, caption: '*T1*\n\n❌ Rejected' },
      ]);

      const outcome = await svc.waitForResult();
      expect(outcome.result).toEqual({ approved: false, reviewer_id: ADMIN });
      expect(outcome.video?.title).toBe('T1');
      expect(svc.pendingVideo).toBeNull();
    });

    it('marks an approved video as uploading and reminds about the rest', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));
      await svc.queueVideo(video('T2'));
      transport.reset();

      await svc.handleUpdate(callback('approve', ADMIN, 100));

      expect(transport.calls).toContainEqual({
        kind: 'caption',
        chatId: ADMIN,
        messageId: 100,
        caption: '*T1*\n\n⏳ Uploading...',
      });
      expect(transport.messagesTo(ADMIN)).toEqual(['1 video(s) remaining. Type /review to continue.']);
      const outcome = await svc.waitForResult();
      expect(outcome.result.approved).toBe(true);
      expect(outcome.video?.title).toBe('T1');
    });

    it('records a verdict from a callback without a message', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));
      transport.reset();

      await svc.handleUpdate(callback('approve', ADMIN));

      expect(transport.calls).toEqual([{ kind: 'answer', callbackId: 'cb-approve', text: '' }]);
      const outcome = await svc.waitForResult();
      expect(outcome.result).toEqual({ approved: true, reviewer_id: ADMIN });
    });

    it('keeps the first verdict when a second button press arrives before it is consumed', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));
      transport.reset();

      await svc.handleUpdate(callback('approve', ADMIN, 100));
      await svc.handleUpdate(callback('reject', ADMIN, 100));

      const captions = transport.calls.flatMap((c) => (c.kind === 'caption' ? [c.caption] : []));
      expect(captions).toEqual(['*T1*\n\n⏳ Uploading...']);
      expect(transport.calls).toContainEqual({ kind: 'answer', callbackId: 'cb-reject', text: 'Already decided' });

      const outcome = await svc.waitForResult();
      expect(outcome.result).toEqual({ approved: true, reviewer_id: ADMIN });
      expect(outcome.video?.title).toBe('T1');
    });

    it('refuses callbacks from other chats', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));
      transport.reset();

      await svc.handleUpdate(callback('approve', 5, 100));

      expect(transport.calls).toEqual([{ kind: 'answer', callbackId: 'cb-approve', text: 'Not authorized' }]);
      expect(svc.pendingVideo?.title).toBe('T1');
    });

    it('answers callbacks with nothing pending', async () => {
      const svc = service({ adminChatId: ADMIN });

      await svc.handleUpdate(callback('reject', ADMIN, 100));

      expect(transport.calls).toEqual([{ kind: 'answer', callbackId: 'cb-reject', text: 'No video pending' }]);
    });

    it('treats any data other than approve as a rejection', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));

      await svc.handleUpdate(callback('something-else', ADMIN, 100));

      const outcome = await svc.waitForResult();
      expect(outcome.result.approved).toBe(false);
    });

    it('rejects waitForResult with CancelledError when aborted', async () => {
      const svc = service({ adminChatId: ADMIN });
      const controller = new AbortController();
      const waiting = svc.waitForResult(controller.signal);
      controller.abort();
      await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe('commands', () => {
    it('keeps review commands in the admin chat', async () => {
      const svc = service({ adminChatId: ADMIN });

      await svc.handleUpdate(command(1, 5, '/review'));
      await svc.handleUpdate(command(2, 5, '/queue'));

      expect(transport.messagesTo(5)).toEqual([
        'Review commands only available in admin chat.',
        'Review commands only available in admin chat.',
      ]);
      expect(svc.listReviewers()).toEqual([]);
    });

    it('tells the reviewer to wait while a video is under review', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));

      await svc.handleUpdate(command(1, ADMIN, '/review'));

      expect(transport.messagesTo(ADMIN)).toEqual([
        'Registered as reviewer.',
        'A video is being reviewed. Please wait.',
      ]);
    });

    it('registers a chat once across repeated /review commands', async () => {
      const svc = service();

      await svc.handleUpdate(command(1, 7, '/review'));
      await svc.handleUpdate(command(2, 7, '/review'));

      expect(svc.listReviewers()).toEqual([{ chat_id: 7, name: 'Sam' }]);
      expect(transport.messagesTo(7)).toEqual([
        'Registered as reviewer.',
        'No videos in queue.',
        'No videos in queue.',
      ]);
    });

    it('reports the approval queue', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.handleUpdate(command(1, ADMIN, '/queue'));
      expect(transport.messagesTo(ADMIN)).toEqual(['Approval queue empty.']);
    });

    it('unregisters reviewers on /stop', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 7, '/review'));
      expect(svc.listReviewers()).toEqual([{ chat_id: 7, name: 'Sam' }]);
      transport.reset();

      await svc.handleUpdate(command(2, 7, '/stop'));

      expect(transport.messagesTo(7)).toEqual(['Removed from reviewers.']);
      expect(svc.listReviewers()).toEqual([]);
    });

    it('answers /help and /start with the help text', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 5, '/help'));
      await svc.handleUpdate(command(2, 5, '/start'));
      expect(transport.messagesTo(5)).toEqual([HELP_TEXT, HELP_TEXT]);
    });

    it('ignores plain chat messages', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 5, 'hello bot'));
      expect(transport.calls).toEqual([]);
    });

    it('queues generation requests and acknowledges them', async () => {
      const svc = service();

      await svc.handleUpdate(command(1, 5, '/generate weather'));
      const claimed = await svc.waitForGenerationRequest();
      expect(claimed).toMatchObject({ topic: 'weather', chat_id: 5, autonomous_source: false, status: 'generating' });

      await svc.handleUpdate(command(2, 6, '/generate'));

      expect(transport.messagesTo(5)).toEqual(['Queued generation\nTopic: weather\nPosition: 1']);
      expect(transport.messagesTo(6)).toEqual([
        'Queued generation from Reddit\nPosition: 2\n\nGenerating another video...',
      ]);
    });

    it('replies Queue full and leaves the generation queue alone', async () => {
      const svc = service();
      for (let i = 0; i < 10; i++) {
        svc.generationQueue.add({ topic: `t${i}`, chat_id: 100 + i, autonomous_source: false });
      }

      await svc.handleUpdate(command(1, 5, '/generate weather'));

      expect(transport.messagesTo(5)).toEqual(['Queue full. Please wait.']);
      expect(svc.generationQueue.size()).toBe(10);
    });

    it('reports generation status', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 5, '/status'));
      expect(transport.messagesTo(5)).toEqual(['Generation queue empty.\n\nUse /generate to create a video.']);

      svc.generationQueue.add({ topic: 'weather', chat_id: 5, autonomous_source: false });
      transport.reset();
      await svc.handleUpdate(command(2, 5, '/status'));
      expect(transport.messagesTo(5)[0]).toMatch(/^\*Generation Queue\* \(1\/10\)\n\n⏳ 1\. weather \(\d+s ago\)\n$/);
    });
  });

  describe('generation requests', () => {
    it('wakes a waiting consumer when a request arrives', async () => {
      const svc = service();
      const waiting = svc.waitForGenerationRequest();

      await svc.handleUpdate(command(1, 5, '/generate cats'));

      await expect(waiting).resolves.toMatchObject({ topic: 'cats', chat_id: 5 });
    });

    it('waits for the running request of a chat before handing out its next one', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 5, '/generate one'));
      await svc.handleUpdate(command(2, 5, '/generate two'));

      await expect(svc.waitForGenerationRequest()).resolves.toMatchObject({ topic: 'one' });
      const next = svc.waitForGenerationRequest();
      svc.completeGeneration(5);
      await expect(next).resolves.toMatchObject({ topic: 'two' });
    });

    it('rejects with CancelledError when aborted', async () => {
      const svc = service();
      const controller = new AbortController();
      const waiting = svc.waitForGenerationRequest(controller.signal);
      controller.abort();
      await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    });

    it('sends a finished video to a non-admin requester and queues it for approval', async () => {
      const svc = service({ adminChatId: ADMIN });

      await svc.notifyGenerationComplete(5, { video_path: '/v/c.mp4', title: 'Cats', script: '', tags: [] });

      expect(transport.videos()).toEqual([
        { kind: 'video', chatId: 5, path: '/v/c.mp4', caption: '*Cats*\n\nGenerated successfully.', keyboard: undefined },
        {
          kind: 'video',
          chatId: ADMIN,
          path: '/v/c.mp4',
          caption: '*Cats*\n\n📹 Video 1/5 remaining in queue',
          keyboard: approvalKeyboard(),
        },
      ]);
      expect(svc.pendingVideo?.title).toBe('Cats');
    });

    it('does not queue videos the admin requested', async () => {
      const svc = service({ adminChatId: ADMIN });

      await svc.notifyGenerationComplete(ADMIN, { video_path: '/v/c.mp4', title: 'Cats', script: '', tags: [] });

      expect(transport.videos()).toHaveLength(1);
      expect(svc.queue.size()).toBe(0);
      expect(svc.pendingVideo).toBeNull();
    });

    it('reports generation progress and failure to the requester', async () => {
      const svc = service();
      await svc.notifyGenerating(5, 'cats');
      await svc.notifyGenerating(5, '');
      await svc.notifyGenerationFailed(5, 'producer exited with code 1');

      expect(transport.messagesTo(5)).toEqual([
        'Generating video...\n\nTopic: cats\n\nThis may take a few minutes.',
        'Generating video from Reddit...\n\nThis may take a few minutes.',
        'Generation failed\n\nproducer exited with code 1',
      ]);
    });
  });

  describe('upload results', () => {
    it('edits the review message with the upload URL', async () => {
      const svc = service({ adminChatId: ADMIN });
      await svc.queueVideo(video('T1'));
      await svc.handleUpdate(callback('approve', ADMIN, 100));
      const { video: reviewed } = await svc.waitForResult();
      if (!reviewed) throw new Error('expected a reviewed video');
      transport.reset();

      await svc.notifyUploadComplete(reviewed, 'https://youtu.be/xyz');

      expect(transport.calls).toEqual([
        { kind: 'caption', chatId: ADMIN, messageId: 100, caption: '*T1*\n\n✅ Uploaded\nhttps://youtu.be/xyz' },
      ]);
    });

    it('broadcasts the result when the caption cannot be edited', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 7, '/review'));
      transport.reset();
      transport.failCaption = true;

      await svc.notifyUploadFailed(
        { ...video('T1'), added_at: '2024-01-01T00:00:00.000Z', chat_id: 7, message_id: 100 },
        new Error('quota exceeded'),
      );

      expect(transport.messagesTo(7)).toEqual(['Failed to upload *T1*\n\nquota exceeded']);
    });

    it('broadcasts the result when there is no message to edit', async () => {
      const svc = service();
      await svc.handleUpdate(command(1, 7, '/review'));
      transport.reset();

      await svc.notifyUploadComplete({ ...video('T1'), added_at: '2024-01-01T00:00:00.000Z' }, 'https://youtu.be/abc');

      expect(transport.calls).toEqual([
        { kind: 'message', chatId: 7, text: '*T1* uploaded\n\nhttps://youtu.be/abc' },
      ]);
    });
  });

  describe('polling', () => {
    it('dispatches polled updates and advances the offset', async () => {
      const svc = service();
      svc.startBot();

      transport.deliver(command(41, 5, '/help'));
      await flushPromises();

      expect(transport.messagesTo(5)).toEqual([HELP_TEXT]);
      expect(svc.offset).toBe(42);

      await svc.stopBot();
    });

    it('retries after a failed poll', async () => {
      const svc = service();
      let failures = 1;
      const realGetUpdates = transport.getUpdates.bind(transport);
      transport.getUpdates = (offset, signal) => {
        if (failures > 0) {
          failures--;
          return Promise.reject(new Error('timeout'));
        }
        return realGetUpdates(offset, signal);
      };
      svc.startBot();

      transport.deliver(command(1, 5, '/help'));
      await new Promise((resolve) => setTimeout(resolve, 30));

      expect(transport.messagesTo(5)).toEqual([HELP_TEXT]);
      await svc.stopBot();
    });
  });
});
