import { Channel, sleep } from '../shared/async.js';
import { CancelledError, QueueEmptyError, QueueFullError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { GenerationQueue } from '../queue/generation-queue.js';
import { VideoQueue, type NewQueuedVideo } from '../queue/video-queue.js';
import type { Artifact, GenerationRequest, QueuedVideo } from '../queue/types.js';
import {
  CALLBACK_APPROVE,
  approvalKeyboard,
  type CallbackQuery,
  type ChatTransport,
  type TelegramUser,
  type Update,
} from '../telegram/types.js';
import { parseCommand } from './commands.js';
import * as text from './messages.js';
import { ReviewerStore } from './reviewers.js';
import type { ApprovalOutcome, ApprovalRequest, ApprovalResult, Reviewer } from './types.js';

export const DEFAULT_PREVIEW_DURATION_S = 30;
const POLL_RETRY_MS = 1_000;

export interface ApprovalServiceOptions {
  transport: ChatTransport;
  dataDir: string;
  /** 0 means no designated admin chat. */
  adminChatId?: number;
  /** Non-positive values fall back to 30s. */
  previewDurationS?: number;
  videoQueueSize?: number;
  generationQueueSize?: number;
  pollRetryMs?: number;
  now?: () => number;
}

interface Poller {
  controller: AbortController;
  task: Promise<void>;
}

/**
 * Chat-driven approval workflow.
 *
 * Owns the approval and generation queues, the single pending-review slot and
 * the reviewer list. Chat commands feed the generation queue; produced videos
 * are presented one at a time and the reviewer's verdict is handed to the
 * single consumer of waitForResult().
 *
 * The slot is only read and written in synchronous stretches of code (never
 * across an await), so the event loop gives the exclusion a lock would.
 */
export class ApprovalService {
  readonly queue: VideoQueue;
  readonly generationQueue: GenerationQueue;

  private readonly transport: ChatTransport;
  private readonly adminChatId: number;
  private readonly previewDurationS: number;
  private readonly reviewers: ReviewerStore;
  private readonly pollRetryMs: number;
  private readonly now: () => number;
  // Capacity 1: one verdict in flight per presented video.
  private readonly results = new Channel<ApprovalResult>(1);
  private readonly generationSignals: Channel<number>;
  private pending: QueuedVideo | null = null;
  private pollOffset = 0;
  private poller: Poller | null = null;

  constructor(opts: ApprovalServiceOptions) {
    this.transport = opts.transport;
    this.adminChatId = opts.adminChatId ?? 0;
    this.previewDurationS =
      opts.previewDurationS !== undefined && opts.previewDurationS > 0
        ? opts.previewDurationS
        : DEFAULT_PREVIEW_DURATION_S;
    this.pollRetryMs = opts.pollRetryMs ?? POLL_RETRY_MS;
    this.now = opts.now ?? Date.now;
    this.reviewers = new ReviewerStore(opts.dataDir);
    this.queue = new VideoQueue(opts.dataDir, opts.videoQueueSize);
    this.generationQueue = new GenerationQueue(opts.dataDir, opts.generationQueueSize);
    this.generationSignals = new Channel<number>(this.generationQueue.maxSize);
  }

  /** Copy of the video currently under review, if any. */
  get pendingVideo(): QueuedVideo | null {
    return this.pending ? { ...this.pending } : null;
  }

  /** Next update_id the poll loop will ask for. */
  get offset(): number {
    return this.pollOffset;
  }

  listReviewers(): Reviewer[] {
    return this.reviewers.list();
  }

  startBot(): void {
    if (this.poller) return;
    const controller = new AbortController();
    this.poller = { controller, task: this.pollCommands(controller.signal) };
  }

  async stopBot(): Promise<void> {
    const poller = this.poller;
    if (!poller) return;
    this.poller = null;
    poller.controller.abort();
    await poller.task;
  }

  /**
   * Append a video to the approval queue, then present it to the admin chat
   * or tell every reviewer it is waiting. Throws QueueFullError.
   */
  async queueVideo(video: NewQueuedVideo): Promise<void> {
    this.queue.add(video);
    logger.info('Video queued for review', {
      title: video.title,
      queue_size: this.queue.size(),
      has_preview: Boolean(video.preview_path),
    });

    if (this.adminChatId !== 0) {
      await this.presentNext(this.adminChatId);
    } else {
      await this.broadcast(text.newVideoQueuedNotice(this.queue.size(), this.queue.maxSize));
    }
  }

  /**
   * Queue a video for review. Only acknowledges the enqueue; the verdict
   * arrives through waitForResult().
   */
  async requestApproval(request: ApprovalRequest, signal?: AbortSignal): Promise<ApprovalResult> {
    if (signal?.aborted) throw new CancelledError();
    await this.queueVideo({
      video_path: request.video_path,
      preview_path: request.preview_path,
      title: request.title,
      script: request.script,
      tags: request.tags ?? [],
      topic: request.topic,
    });
    return { approved: false, message: 'queued' };
  }

  /**
   * Present the head of the approval queue to `chatId`, unless a review is
   * already in progress. A failed send puts the video back at the tail.
   */
  async presentNext(chatId: number): Promise<void> {
    if (this.pending) {
      logger.debug('Skipping send: video already pending review', { pending_title: this.pending.title });
      return;
    }

    let video: QueuedVideo;
    try {
      video = this.queue.pop();
    } catch (err) {
      if (err instanceof QueueEmptyError) {
        logger.debug('Skipping send: queue empty');
        return;
      }
      throw err;
    }
    this.pending = video;

    const position = this.queue.size() + 1;
    const caption = text.presentationCaption(video, position, this.queue.maxSize, this.previewDurationS);
    const mediaPath = video.preview_path || video.video_path;
    logger.debug('Sending video for review', { title: video.title, path: mediaPath });

    try {
      const sent = await this.transport.sendVideo(chatId, mediaPath, caption, approvalKeyboard());
      if (this.pending === video) {
        video.message_id = sent.message_id;
        video.chat_id = sent.chat_id;
      }
      logger.info('Video sent for review', {
        title: video.title,
        chat_id: sent.chat_id,
        message_id: sent.message_id,
      });
    } catch (err) {
      logger.error('Failed to send video for review', { title: video.title, error: errorMessage(err) });
      if (this.pending === video) this.pending = null;
      this.requeue(video);
    }
  }

  /**
   * Wait for the next verdict. The pending slot is read and cleared together
   * with the receive, so the returned video is the one the verdict was for.
   */
  async waitForResult(signal?: AbortSignal): Promise<ApprovalOutcome> {
    const result = await this.results.receive(signal);
    const video = this.pending;
    this.pending = null;
    return { result, video };
  }

  /** Claim the next pending generation request, waiting for one if needed. */
  async waitForGenerationRequest(signal?: AbortSignal): Promise<GenerationRequest> {
    for (;;) {
      const request = this.generationQueue.tryPop();
      if (request) return request;
      await this.generationSignals.receive(signal);
    }
  }

  completeGeneration(chatId: number): void {
    this.generationQueue.complete(chatId);
    this.signalGeneration(chatId);
  }

  failGeneration(chatId: number): void {
    this.generationQueue.fail(chatId);
    this.signalGeneration(chatId);
  }

  async notifyGenerating(chatId: number, topic: string): Promise<void> {
    await this.reply(chatId, text.generatingNotice(topic));
  }

  /**
   * Send the finished video to whoever asked for it. Videos requested from a
   * chat other than the admin chat also go to the approval queue.
   */
  async notifyGenerationComplete(chatId: number, artifact: Artifact): Promise<void> {
    const caption = text.generationCompleteCaption(
      artifact.title,
      Boolean(artifact.preview_path),
      this.previewDurationS,
    );
    try {
      await this.transport.sendVideo(chatId, artifact.preview_path || artifact.video_path, caption);
    } catch (err) {
      logger.error('Failed to send video to requester', { chat_id: chatId, error: errorMessage(err) });
    }

    if (this.adminChatId !== 0 && chatId !== this.adminChatId) {
      try {
        await this.queueVideo(artifact);
      } catch (err) {
        logger.error('Failed to queue video for approval', { title: artifact.title, error: errorMessage(err) });
      }
    }
  }

  async notifyGenerationFailed(chatId: number, error: string): Promise<void> {
    await this.reply(chatId, text.generationFailedNotice(error));
  }

  async notifyUploadComplete(video: QueuedVideo, url: string): Promise<void> {
    const { caption, fallback } = text.uploadCompleteTexts(video.title, url);
    await this.notifyResult(video, caption, fallback);
  }

  async notifyUploadFailed(video: QueuedVideo, error: unknown): Promise<void> {
    const { caption, fallback } = text.uploadFailedTexts(video.title, errorMessage(error));
    await this.notifyResult(video, caption, fallback);
  }

  /** Dispatch one chat update. Never throws. */
  async handleUpdate(update: Update): Promise<void> {
    try {
      if (update.callback_query) {
        await this.handleCallbackQuery(update.callback_query);
        return;
      }

      const message = update.message;
      if (!message?.text) return;
      const parsed = parseCommand(message.text);
      if (!parsed) return;

      const chatId = message.chat.id;
      switch (parsed.command) {
        case 'generate':
          await this.handleGenerate(chatId, parsed.args);
          break;
        case 'review':
          await this.handleReview(chatId, message.from);
          break;
        case 'queue':
          await this.handleQueue(chatId);
          break;
        case 'status':
          await this.handleStatus(chatId);
          break;
        case 'stop':
          await this.handleStop(chatId, message.from);
          break;
        case 'help':
          await this.reply(chatId, text.HELP_TEXT);
          break;
      }
    } catch (err) {
      logger.error('Update handling failed', { update_id: update.update_id, error: errorMessage(err) });
    }
  }

  private async pollCommands(signal: AbortSignal): Promise<void> {
    logger.info('Telegram bot started');
    while (!signal.aborted) {
      let updates: Update[];
      try {
        updates = await this.transport.getUpdates(this.pollOffset, signal);
      } catch (err) {
        if (signal.aborted) break;
        logger.warn('Polling updates failed, retrying', { error: errorMessage(err) });
        await sleep(this.pollRetryMs, signal);
        continue;
      }

      for (const update of updates) {
        this.pollOffset = update.update_id + 1;
        await this.handleUpdate(update);
      }
    }
    logger.info('Telegram bot stopped');
  }

  private async handleGenerate(chatId: number, topic: string): Promise<void> {
    const autonomous = topic === '';

    if (this.generationQueue.isFull()) {
      await this.reply(chatId, text.MSG_QUEUE_FULL);
      return;
    }

    try {
      this.generationQueue.add({ topic, chat_id: chatId, autonomous_source: autonomous });
    } catch (err) {
      await this.reply(chatId, `Failed to queue: ${errorMessage(err)}`);
      return;
    }

    const reply = text.generationQueuedReply(
      { topic, autonomous_source: autonomous },
      this.generationQueue.size(),
      this.generationQueue.isGenerating(),
    );
    await this.reply(chatId, reply);
    this.signalGeneration(chatId);
  }

  private async handleReview(chatId: number, user?: TelegramUser): Promise<void> {
    if (!this.isAdminChat(chatId)) {
      await this.reply(chatId, text.MSG_NOT_ADMIN_CHAT);
      return;
    }

    const registered = this.reviewers.register({
      chat_id: chatId,
      name: user?.first_name ?? '',
      username: user?.username,
    });
    if (registered) {
      logger.info('Reviewer registered', { name: user?.first_name, chat_id: chatId });
      await this.reply(chatId, text.MSG_REGISTERED);
    }

    if (this.pending) {
      await this.reply(chatId, text.MSG_REVIEW_BUSY);
      return;
    }
    if (this.queue.size() === 0) {
      await this.reply(chatId, text.MSG_NO_VIDEOS);
      return;
    }
    await this.presentNext(chatId);
  }

  private async handleQueue(chatId: number): Promise<void> {
    if (!this.isAdminChat(chatId)) {
      await this.reply(chatId, text.MSG_NOT_ADMIN_CHAT);
      return;
    }
    const videos = this.queue.list();
    if (videos.length === 0) {
      await this.reply(chatId, text.MSG_APPROVAL_QUEUE_EMPTY);
      return;
    }
    await this.reply(chatId, text.approvalQueueReport(videos, this.queue.maxSize, this.now()));
  }

  private async handleStatus(chatId: number): Promise<void> {
    const requests = this.generationQueue.list();
    if (requests.length === 0) {
      await this.reply(chatId, text.MSG_GENERATION_QUEUE_EMPTY);
      return;
    }
    await this.reply(
      chatId,
      text.generationStatusReport(requests, this.generationQueue.maxSize, this.now()),
    );
  }

  private async handleStop(chatId: number, user?: TelegramUser): Promise<void> {
    this.reviewers.remove(chatId);
    logger.info('Reviewer unregistered', { name: user?.first_name, chat_id: chatId });
    await this.reply(chatId, text.MSG_UNREGISTERED);
  }

  private async handleCallbackQuery(cb: CallbackQuery): Promise<void> {
    logger.debug('Callback received', { data: cb.data, from: cb.from.id });
    const callerChat = cb.message?.chat.id ?? cb.from.id;

    if (!this.isAdminChat(callerChat)) {
      logger.debug('Callback rejected: wrong chat', { chat_id: callerChat, expected: this.adminChatId });
      await this.answer(cb.id, text.MSG_NOT_AUTHORIZED);
      return;
    }

    const video = this.pending;
    if (!video) {
      logger.debug('Callback rejected: no pending video');
      await this.answer(cb.id, text.MSG_NO_PENDING);
      return;
    }

    // A buffered verdict always belongs to the current slot: consuming it clears the slot.
    if (this.results.length > 0) {
      logger.debug('Callback ignored: verdict already recorded', { title: video.title });
      await this.answer(cb.id, text.MSG_ALREADY_DECIDED);
      return;
    }

    const approved = cb.data === CALLBACK_APPROVE;
    logger.info('Video decision', { approved, title: video.title });

    await this.answer(cb.id, '');

    const message = cb.message;
    if (message) {
      await this.bestEffort('clear buttons', () =>
        this.transport.editMessageReplyMarkup(message.chat.id, message.message_id),
      );
      await this.bestEffort('edit caption', () =>
        this.transport.editMessageCaption(
          message.chat.id,
          message.message_id,
          text.verdictCaption(video.title, approved),
        ),
      );
    }

    if (!this.results.trySend({ approved, reviewer_id: cb.from.id })) {
      logger.warn('Verdict dropped: previous verdict not consumed yet', { title: video.title });
    }

    const remaining = this.queue.size();
    if (remaining > 0 && message) {
      await this.reply(message.chat.id, text.remainingReminder(remaining));
    }
  }

  private async notifyResult(video: QueuedVideo, caption: string, fallback: string): Promise<void> {
    if (video.message_id && video.chat_id) {
      const chatId = video.chat_id;
      const messageId = video.message_id;
      const edited = await this.bestEffort('edit result caption', () =>
        this.transport.editMessageCaption(chatId, messageId, caption),
      );
      if (edited) return;
    }
    await this.broadcast(fallback);
  }

  private async broadcast(message: string): Promise<void> {
    for (const reviewer of this.reviewers.list()) {
      await this.reply(reviewer.chat_id, message);
    }
  }

  private isAdminChat(chatId: number): boolean {
    return this.adminChatId === 0 || chatId === this.adminChatId;
  }

  private requeue(video: QueuedVideo): void {
    try {
      this.queue.add(video);
    } catch (err) {
      if (err instanceof QueueFullError) {
        logger.error('Approval queue full, dropping video', { title: video.title });
        return;
      }
      throw err;
    }
  }

  private signalGeneration(chatId: number): void {
    if (!this.generationSignals.trySend(chatId)) {
      logger.debug('Generation signal coalesced', { chat_id: chatId });
    }
  }

  private async reply(chatId: number, message: string): Promise<void> {
    await this.bestEffort('send message', () => this.transport.sendMessage(chatId, message));
  }

  private async answer(callbackId: string, message: string): Promise<void> {
    await this.bestEffort('answer callback', () =>
      this.transport.answerCallbackQuery(callbackId, message),
    );
  }

  /** Run a transport call, logging instead of throwing. Resolves to success. */
  private async bestEffort(action: string, fn: () => Promise<unknown>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (err) {
      logger.warn(`Telegram ${action} failed`, { error: errorMessage(err) });
      return false;
    }
  }
}
