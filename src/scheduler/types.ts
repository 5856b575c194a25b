import type { Artifact } from '../queue/types.js';

/**
 * Creates finished videos. Implementations may chain an LLM, TTS, image
 * search and a media assembler; the control plane only sees the artifact.
 */
export interface Producer {
  generate(topic: string, signal?: AbortSignal): Promise<Artifact>;
  /** Let an external content source pick the topic. */
  generateAutonomous(signal?: AbortSignal): Promise<Artifact>;
}

export interface PublishResult {
  url: string;
  video_id?: string;
}

/** Uploads an approved artifact. Not retried by the caller. */
export interface Publisher {
  publish(artifact: Artifact, signal?: AbortSignal): Promise<PublishResult>;
}
