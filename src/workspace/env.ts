import { existsSync, readFileSync } from 'node:fs';
import { getReelroomPaths } from './paths.js';
import { WorkspaceEnvSchema } from '../shared/schemas.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

/**
 * Load `.reelroom/env.json` (bot token, YouTube OAuth client) into the
 * current process. Variables already present in the environment win.
 */
export function loadWorkspaceEnv(cwd: string = process.cwd()): void {
  const filePath = getReelroomPaths(cwd).envFile;
  if (!existsSync(filePath)) return;
  try {
    const parsed = WorkspaceEnvSchema.parse(JSON.parse(readFileSync(filePath, 'utf8')));
    for (const [key, value] of Object.entries(parsed)) {
      if (value && !process.env[key]) {
        process.env[key] = value;
      }
    }
  } catch (err) {
    logger.warn('Failed to load workspace env file', { path: filePath, error: errorMessage(err) });
  }
}
