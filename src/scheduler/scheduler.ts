import { unlinkSync } from 'node:fs';
import { sleep } from '../shared/async.js';
import { errorMessage, isCancelled } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ApprovalService } from '../approval/service.js';
import type { ApprovalOutcome } from '../approval/types.js';
import type { Artifact, GenerationRequest, QueuedVideo } from '../queue/types.js';
import type { Producer, Publisher, PublishResult } from './types.js';

export const DEFAULT_INTERVAL_MS = 15 * 60_000;

export interface SchedulerOptions {
  producer: Producer;
  /** Required when approvals or upload-without-approval are in use. */
  publisher?: Publisher | null;
  /** Chat approval flow; null runs the tick loop alone. */
  approval?: ApprovalService | null;
  intervalMs?: number;
  /** Publish every produced artifact directly instead of queueing it. */
  uploadWithoutApproval?: boolean;
}

export type TickOutcome = 'skipped' | 'queued' | 'published' | 'generated' | 'failed';

/**
 * Periodic producer plus the two drains that serve the chat workflow.
 *
 * run() starts the bot, generates once immediately and then every interval,
 * while one task hands approved videos to the publisher and another works
 * through /generate requests. Everything stops when the signal aborts.
 */
export class Scheduler {
  private readonly producer: Producer;
  private readonly publisher: Publisher | null;
  private readonly approval: ApprovalService | null;
  private readonly intervalMs: number;
  private readonly uploadWithoutApproval: boolean;

  constructor(opts: SchedulerOptions) {
    this.producer = opts.producer;
    this.publisher = opts.publisher ?? null;
    this.approval = opts.approval ?? null;
    this.intervalMs = opts.intervalMs && opts.intervalMs > 0 ? opts.intervalMs : DEFAULT_INTERVAL_MS;
    this.uploadWithoutApproval = opts.uploadWithoutApproval ?? false;
  }

  async run(signal: AbortSignal): Promise<void> {
    const approval = this.uploadWithoutApproval ? null : this.approval;
    if (approval && !this.publisher) {
      throw new Error('Approval flow requires a publisher');
    }
    const drains: Array<Promise<void>> = [];

    if (approval) {
      approval.startBot();
      drains.push(this.drainApprovals(approval, signal), this.drainRequests(approval, signal));
    }

    logger.info('Starting scheduler', {
      interval_ms: this.intervalMs,
      approval: approval !== null,
      upload: this.uploadWithoutApproval,
    });

    try {
      await this.tick(signal);
      while (!signal.aborted) {
        await sleep(this.intervalMs, signal);
        if (signal.aborted) break;
        await this.tick(signal);
      }
    } finally {
      logger.info('Shutting down scheduler');
      if (approval) await approval.stopBot();
      await Promise.all(drains);
    }
  }

  /** One autonomous generation, skipped while the approval queue is full. */
  async tick(signal?: AbortSignal): Promise<TickOutcome> {
    const approval = this.uploadWithoutApproval ? null : this.approval;
    if (approval?.queue.isFull()) {
      logger.info('Queue is full, skipping generation');
      return 'skipped';
    }

    logger.info('Generating video from autonomous source');
    let artifact: Artifact;
    try {
      artifact = await this.producer.generateAutonomous(signal);
    } catch (err) {
      if (isCancelled(err)) return 'failed';
      logger.error('Generation failed', { error: errorMessage(err) });
      return 'failed';
    }
    logger.info('Video generated', { title: artifact.title, path: artifact.video_path });

    if (this.uploadWithoutApproval) {
      try {
        const result = await this.publish(artifact, signal);
        logger.info('Upload complete', { title: artifact.title, url: result.url });
        return 'published';
      } catch (err) {
        logger.error('Upload failed', { title: artifact.title, error: errorMessage(err) });
        return 'failed';
      }
    }

    if (approval) {
      try {
        await approval.requestApproval({ ...artifact }, signal);
        return 'queued';
      } catch (err) {
        logger.error('Failed to queue for approval', { title: artifact.title, error: errorMessage(err) });
        return 'failed';
      }
    }

    logger.warn('No approval channel or upload configured; video left on disk', {
      path: artifact.video_path,
    });
    return 'generated';
  }

  /** Consume verdicts; publish approved videos and report the outcome. */
  async drainApprovals(approval: ApprovalService, signal: AbortSignal): Promise<void> {
    for (;;) {
      let outcome: ApprovalOutcome;
      try {
        outcome = await approval.waitForResult(signal);
      } catch (err) {
        if (isCancelled(err)) return;
        throw err;
      }

      const video = outcome.video;
      if (!video) continue;

      if (!outcome.result.approved) {
        logger.info('Video rejected', { title: video.title, reviewer_id: outcome.result.reviewer_id });
        removePreview(video);
        continue;
      }

      logger.info('Video approved, uploading', { title: video.title });
      try {
        const result = await this.publish(video, signal);
        logger.info('Upload complete', { title: video.title, url: result.url });
        await approval.notifyUploadComplete(video, result.url);
      } catch (err) {
        if (isCancelled(err)) return;
        logger.error('Upload failed', { title: video.title, error: errorMessage(err) });
        await approval.notifyUploadFailed(video, err);
      } finally {
        removePreview(video);
      }
    }
  }

  /** Work through /generate requests one at a time. */
  async drainRequests(approval: ApprovalService, signal: AbortSignal): Promise<void> {
    for (;;) {
      let request: GenerationRequest;
      try {
        request = await approval.waitForGenerationRequest(signal);
      } catch (err) {
        if (isCancelled(err)) return;
        logger.error('Waiting for generation request failed', { error: errorMessage(err) });
        await sleep(1_000, signal);
        continue;
      }

      logger.info('Processing generation request', {
        topic: request.topic,
        autonomous_source: request.autonomous_source,
        chat_id: request.chat_id,
      });
      await approval.notifyGenerating(request.chat_id, request.topic);

      let artifact: Artifact;
      try {
        artifact = request.autonomous_source
          ? await this.producer.generateAutonomous(signal)
          : await this.producer.generate(request.topic, signal);
      } catch (err) {
        // Left in `generating`; demoted to pending on the next start.
        if (isCancelled(err)) return;
        logger.error('Generation failed', { chat_id: request.chat_id, error: errorMessage(err) });
        await approval.notifyGenerationFailed(request.chat_id, errorMessage(err));
        approval.failGeneration(request.chat_id);
        continue;
      }

      logger.info('Video generated', { title: artifact.title, path: artifact.video_path });
      await approval.notifyGenerationComplete(request.chat_id, artifact);
      approval.completeGeneration(request.chat_id);
    }
  }

  private async publish(artifact: Artifact, signal?: AbortSignal): Promise<PublishResult> {
    if (!this.publisher) {
      throw new Error('No publisher configured');
    }
    return this.publisher.publish(artifact, signal);
  }
}

function removePreview(video: QueuedVideo): void {
  if (!video.preview_path) return;
  try {
    unlinkSync(video.preview_path);
    logger.debug('Cleaned up preview file', { path: video.preview_path });
  } catch (err) {
    logger.warn('Failed to clean up preview file', { path: video.preview_path, error: errorMessage(err) });
  }
}
