import type { z } from 'zod';
import type {
  ArtifactSchema,
  GenerationRequestSchema,
  GenerationStatusSchema,
  QueuedVideoSchema,
} from '../shared/schemas.js';

/** A finished media package as returned by a Producer. */
export type Artifact = z.infer<typeof ArtifactSchema>;

/**
 * An artifact waiting in the approval queue. `chat_id` / `message_id` are
 * filled in once, when the artifact is presented in chat.
 */
export type QueuedVideo = z.infer<typeof QueuedVideoSchema>;

export type GenerationStatus = z.infer<typeof GenerationStatusSchema>;

export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;
