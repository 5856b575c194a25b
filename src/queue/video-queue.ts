import { PersistentQueue } from './persistent-queue.js';
import { QueuedVideoSchema } from '../shared/schemas.js';
import type { QueuedVideo } from './types.js';

export const VIDEO_QUEUE_FILE = 'video_queue.json';
export const DEFAULT_VIDEO_QUEUE_SIZE = 5;

export type NewQueuedVideo = Omit<QueuedVideo, 'added_at'>;

/** Produced artifacts awaiting a verdict, strictly first in, first out. */
export class VideoQueue extends PersistentQueue<QueuedVideo> {
  constructor(dataDir: string, maxSize: number = DEFAULT_VIDEO_QUEUE_SIZE) {
    super({
      dataDir,
      filename: VIDEO_QUEUE_FILE,
      maxSize,
      schema: QueuedVideoSchema,
      label: 'approval queue',
    });
  }

  override add(video: NewQueuedVideo): void {
    super.add({ ...video, added_at: new Date().toISOString() });
  }
}
