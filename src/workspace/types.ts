import type { z } from 'zod';
import type { WorkspaceConfigSchema } from '../shared/schemas.js';

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;

export interface ReelroomPaths {
  root: string;    // .reelroom/
  config: string;  // .reelroom/config.yaml
  envFile: string; // .reelroom/env.json
  dataDir: string; // .reelroom/data/
}

/** Control-plane settings after config file and environment overrides. */
export interface ControlPlaneSettings {
  adminChatId: number;
  intervalMs: number;
  uploadWithoutApproval: boolean;
  dataDir: string;
  previewDurationS: number;
}
