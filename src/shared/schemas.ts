import { z } from 'zod';

export const WorkspaceConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  data_dir: z.string().default('.reelroom/data'),
  telegram: z
    .object({
      admin_chat_id: z.number().int().default(0),
      preview_duration_s: z.number().default(30),
    })
    .default({}),
  scheduler: z
    .object({
      interval: z.string().default('15m'),
      upload_without_approval: z.boolean().default(false),
    })
    .default({}),
  producer: z
    .object({
      command: z.string().min(1),
      args: z.array(z.string()).default([]),
    })
    .optional(),
  youtube: z
    .object({
      privacy: z.enum(['public', 'private', 'unlisted']).default('private'),
      category_id: z.string().default('22'),
    })
    .default({}),
});

export const WorkspaceEnvSchema = z.record(z.string());

export const ArtifactSchema = z.object({
  video_path: z.string().min(1),
  preview_path: z.string().optional(),
  title: z.string(),
  script: z.string().default(''),
  tags: z.array(z.string()).default([]),
  topic: z.string().optional(),
});

export const QueuedVideoSchema = ArtifactSchema.extend({
  added_at: z.string(),
  message_id: z.number().int().optional(),
  chat_id: z.number().int().optional(),
});

export const GenerationStatusSchema = z.enum(['pending', 'generating']);

export const GenerationRequestSchema = z.object({
  topic: z.string(),
  chat_id: z.number().int(),
  autonomous_source: z.boolean(),
  created_at: z.string(),
  status: GenerationStatusSchema,
});

export const ReviewerSchema = z.object({
  chat_id: z.number().int(),
  name: z.string(),
  username: z.string().optional(),
});
