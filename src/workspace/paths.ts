import { join } from 'node:path';
import type { ReelroomPaths } from './types.js';

export const WORKSPACE_DIR = '.reelroom';

export function getReelroomPaths(cwd: string = process.cwd()): ReelroomPaths {
  const root = join(cwd, WORKSPACE_DIR);
  return {
    root,
    config: join(root, 'config.yaml'),
    envFile: join(root, 'env.json'),
    dataDir: join(root, 'data'),
  };
}
