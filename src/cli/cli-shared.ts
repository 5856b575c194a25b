import { getReelroomPaths } from '../workspace/paths.js';
import { readWorkspaceConfig, resolveSettings } from '../workspace/config.js';
import type { ControlPlaneSettings, ReelroomPaths, WorkspaceConfig } from '../workspace/types.js';
import { TelegramClient } from '../telegram/client.js';
import { CommandProducer } from '../producer/command-producer.js';
import { YouTubePublisher } from '../connector/youtube/publisher.js';
import { errorMessage } from '../shared/errors.js';

export interface WorkspaceContext {
  paths: ReelroomPaths;
  config: WorkspaceConfig;
  settings: ControlPlaneSettings;
}

/**
 * Load workspace config and resolve settings, or print error and exit.
 * Use at the top of every CLI command that requires an initialized workspace.
 */
export function requireWorkspace(cwd: string = process.cwd()): WorkspaceContext {
  const paths = getReelroomPaths(cwd);
  let config: WorkspaceConfig;
  let settings: ControlPlaneSettings;
  try {
    config = readWorkspaceConfig(paths.config);
    settings = resolveSettings(config, cwd);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
  return { paths, config, settings };
}

/** Bot client from TELEGRAM_BOT_TOKEN, or null when no token is set. */
export function buildTelegramClient(env: NodeJS.ProcessEnv = process.env): TelegramClient | null {
  const token = env['TELEGRAM_BOT_TOKEN'];
  return token ? new TelegramClient({ token }) : null;
}

export function buildProducer(config: WorkspaceConfig, cwd: string = process.cwd()): CommandProducer {
  if (!config.producer) {
    throw new Error('No producer configured. Set producer.command in .reelroom/config.yaml');
  }
  return new CommandProducer({
    command: config.producer.command,
    args: config.producer.args,
    cwd,
  });
}

/** YouTube publisher from YOUTUBE_* credentials, or null when any is missing. */
export function buildPublisher(
  config: WorkspaceConfig,
  env: NodeJS.ProcessEnv = process.env,
): YouTubePublisher | null {
  const clientId = env['YOUTUBE_CLIENT_ID'];
  const clientSecret = env['YOUTUBE_CLIENT_SECRET'];
  const refreshToken = env['YOUTUBE_REFRESH_TOKEN'];
  if (!clientId || !clientSecret || !refreshToken) return null;
  return new YouTubePublisher({
    clientId,
    clientSecret,
    refreshToken,
    privacy: config.youtube.privacy,
    categoryId: config.youtube.category_id,
  });
}
