import { formatDuration } from '../shared/duration.js';
import type { GenerationRequest, QueuedVideo } from '../queue/types.js';

export const HELP_TEXT = `*Reelroom Bot*

*Commands:*
/generate [topic] - Generate video (Reddit topic if empty)
/status - Generation queue status
/help - Show this message

*Admin:*
/review - Review next video
/queue - Approval queue status
/stop - Unsubscribe from notifications`;

export const MSG_QUEUE_FULL = 'Queue full. Please wait.';
export const MSG_NOT_ADMIN_CHAT = 'Review commands only available in admin chat.';
export const MSG_REGISTERED = 'Registered as reviewer.';
export const MSG_REVIEW_BUSY = 'A video is being reviewed. Please wait.';
export const MSG_NO_VIDEOS = 'No videos in queue.';
export const MSG_UNREGISTERED = 'Removed from reviewers.';
export const MSG_APPROVAL_QUEUE_EMPTY = 'Approval queue empty.';
export const MSG_GENERATION_QUEUE_EMPTY = 'Generation queue empty.\n\nUse /generate to create a video.';
export const MSG_NOT_AUTHORIZED = 'Not authorized';
export const MSG_NO_PENDING = 'No video pending';
export const MSG_ALREADY_DECIDED = 'Already decided';

const MINUTE_MS = 60_000;

function previewSuffix(durationS: number): string {
  return `\n\n⏱ Preview (${Math.round(durationS)}s)`;
}

export function presentationCaption(
  video: QueuedVideo,
  position: number,
  capacity: number,
  previewDurationS: number,
): string {
  let caption = `*${video.title}*\n\n📹 Video ${position}/${capacity} remaining in queue`;
  if (video.preview_path) caption += previewSuffix(previewDurationS);
  return caption;
}

export function newVideoQueuedNotice(count: number, capacity: number): string {
  return `📹 New video queued (${count}/${capacity} in queue)\n\nType /review to review.`;
}

export function verdictCaption(title: string, approved: boolean): string {
  return approved ? `*${title}*\n\n⏳ Uploading...` : `*${title}*\n\n❌ Rejected`;
}

export function remainingReminder(remaining: number): string {
  return `${remaining} video(s) remaining. Type /review to continue.`;
}

export function generationQueuedReply(
  request: Pick<GenerationRequest, 'topic' | 'autonomous_source'>,
  position: number,
  generating: boolean,
): string {
  let msg = request.autonomous_source
    ? `Queued generation from Reddit\nPosition: ${position}`
    : `Queued generation\nTopic: ${request.topic}\nPosition: ${position}`;
  if (generating) msg += '\n\nGenerating another video...';
  return msg;
}

export function generationStatusReport(
  requests: GenerationRequest[],
  capacity: number,
  now: number,
): string {
  let msg = `*Generation Queue* (${requests.length}/${capacity})\n\n`;
  requests.forEach((req, i) => {
    const icon = req.status === 'generating' ? '🔄' : '⏳';
    const topic = req.autonomous_source ? '(Reddit)' : req.topic;
    const age = formatDuration(now - Date.parse(req.created_at));
    msg += `${icon} ${i + 1}. ${topic} (${age} ago)\n`;
  });
  return msg;
}

export function approvalQueueReport(videos: QueuedVideo[], capacity: number, now: number): string {
  let msg = `*Approval Queue* (${videos.length}/${capacity})\n\n`;
  videos.forEach((video, i) => {
    const age = formatDuration(now - Date.parse(video.added_at), MINUTE_MS);
    msg += `${i + 1}. ${video.title} (${age} ago)\n`;
  });
  msg += '\nType /review to review.';
  return msg;
}

export function generatingNotice(topic: string): string {
  return topic
    ? `Generating video...\n\nTopic: ${topic}\n\nThis may take a few minutes.`
    : 'Generating video from Reddit...\n\nThis may take a few minutes.';
}

export function generationCompleteCaption(
  title: string,
  hasPreview: boolean,
  previewDurationS: number,
): string {
  let caption = `*${title}*\n\nGenerated successfully.`;
  if (hasPreview) caption += previewSuffix(previewDurationS);
  return caption;
}

export function generationFailedNotice(error: string): string {
  return `Generation failed\n\n${error}`;
}

export function uploadCompleteTexts(title: string, url: string): { caption: string; fallback: string } {
  return {
    caption: `*${title}*\n\n✅ Uploaded\n${url}`,
    fallback: `*${title}* uploaded\n\n${url}`,
  };
}

export function uploadFailedTexts(title: string, error: string): { caption: string; fallback: string } {
  return {
    caption: `*${title}*\n\n❌ Upload failed: ${error}`,
    fallback: `Failed to upload *${title}*\n\n${error}`,
  };
}
