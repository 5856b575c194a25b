import { mkdirSync, existsSync } from 'node:fs';
import { getReelroomPaths } from './paths.js';
import { defaultWorkspaceConfig, writeWorkspaceConfig } from './config.js';
import type { WorkspaceConfig } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
  adminChatId?: number;
}

export function initWorkspace(opts: InitOptions = {}): WorkspaceConfig {
  const paths = getReelroomPaths(opts.cwd);

  if (existsSync(paths.config) && !opts.force) {
    throw new Error(
      `Workspace already exists at ${paths.root}. Use --force to reinitialize.`,
    );
  }

  mkdirSync(paths.root, { recursive: true });
  mkdirSync(paths.dataDir, { recursive: true });

  const config = defaultWorkspaceConfig();
  if (opts.adminChatId !== undefined) {
    config.telegram.admin_chat_id = opts.adminChatId;
  }

  writeWorkspaceConfig(paths.config, config);
  return config;
}
