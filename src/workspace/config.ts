import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { dump, load } from 'js-yaml';
import { parseDuration } from '../shared/duration.js';
import { WorkspaceConfigSchema } from '../shared/schemas.js';
import type { ControlPlaneSettings, WorkspaceConfig } from './types.js';

export function defaultWorkspaceConfig(): WorkspaceConfig {
  return WorkspaceConfigSchema.parse({});
}

export function readWorkspaceConfig(configPath: string): WorkspaceConfig {
  if (!existsSync(configPath)) {
    throw new Error('Workspace not initialized. Run `reelroom init` first.');
  }
  const raw = readFileSync(configPath, 'utf8');
  const result = WorkspaceConfigSchema.safeParse(load(raw) ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid workspace config: ${issues}`);
  }
  return result.data;
}

export function writeWorkspaceConfig(configPath: string, config: WorkspaceConfig): void {
  writeFileSync(configPath, dump(config), 'utf8');
}

function intFromEnv(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve the handful of settings the control plane reads, applying
 * REELROOM_* environment overrides on top of config.yaml.
 */
export function resolveSettings(
  config: WorkspaceConfig,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): ControlPlaneSettings {
  const dataDir = env['REELROOM_DATA_DIR'] || config.data_dir;
  const interval = env['REELROOM_INTERVAL'] || config.scheduler.interval;
  const previewDuration =
    intFromEnv('REELROOM_PREVIEW_DURATION', env) ?? config.telegram.preview_duration_s;

  return {
    adminChatId: intFromEnv('REELROOM_ADMIN_CHAT_ID', env) ?? config.telegram.admin_chat_id,
    intervalMs: parseDuration(interval),
    uploadWithoutApproval: config.scheduler.upload_without_approval,
    dataDir: isAbsolute(dataDir) ? dataDir : resolve(cwd, dataDir),
    previewDurationS: previewDuration,
  };
}
