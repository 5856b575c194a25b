import type { z } from 'zod';
import type { ReviewerSchema } from '../shared/schemas.js';
import type { QueuedVideo } from '../queue/types.js';

export type Reviewer = z.infer<typeof ReviewerSchema>;

export interface ApprovalRequest {
  video_path: string;
  preview_path?: string;
  title: string;
  script: string;
  tags?: string[];
  topic?: string;
}

/**
 * A verdict from the chat, or the synchronous "queued" acknowledgement that
 * requestApproval returns.
 */
export interface ApprovalResult {
  approved: boolean;
  reviewer_id?: number;
  message?: string;
}

/** A verdict paired with the artifact that was under review when it arrived. */
export interface ApprovalOutcome {
  result: ApprovalResult;
  video: QueuedVideo | null;
}
