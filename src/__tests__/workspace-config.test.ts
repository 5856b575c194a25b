import { describe, it, expect, afterEach } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { readWorkspaceConfig, resolveSettings } from '../workspace/config.js';
import { getReelroomPaths } from '../workspace/paths.js';
import { createTempWorkspace, type TempWorkspace } from './test-helpers.js';

describe('workspace config', () => {
  let ws: TempWorkspace | undefined;

  afterEach(() => {
    ws?.cleanup();
    ws = undefined;
  });

  it('fills defaults for missing sections', () => {
    ws = createTempWorkspace();
    writeFileSync(join(ws.reelroomDir, 'config.yaml'), 'telegram:\n  admin_chat_id: 42\n', 'utf8');

    const config = readWorkspaceConfig(getReelroomPaths(ws.workspaceDir).config);

    expect(config.telegram).toEqual({ admin_chat_id: 42, preview_duration_s: 30 });
    expect(config.scheduler).toEqual({ interval: '15m', upload_without_approval: false });
    expect(config.youtube).toEqual({ privacy: 'private', category_id: '22' });
    expect(config.producer).toBeUndefined();
  });

  it('rejects invalid values with the offending path', () => {
    ws = createTempWorkspace();
    writeFileSync(join(ws.reelroomDir, 'config.yaml'), 'telegram:\n  admin_chat_id: nope\n', 'utf8');

    const configPath = getReelroomPaths(ws.workspaceDir).config;
    expect(() => readWorkspaceConfig(configPath)).toThrow(
      'Invalid workspace config: telegram.admin_chat_id:',
    );
  });

  it('asks for init when there is no config file', () => {
    expect(() => readWorkspaceConfig('/nonexistent/.reelroom/config.yaml')).toThrow('reelroom init');
  });

  it('resolves settings with environment overrides', () => {
    ws = createTempWorkspace({ producer: { command: './make-video', args: [] } });
    const config = readWorkspaceConfig(getReelroomPaths(ws.workspaceDir).config);

    const base = resolveSettings(config, '/srv/app', {});
    expect(base).toEqual({
      adminChatId: 0,
      intervalMs: 900_000,
      uploadWithoutApproval: false,
      dataDir: '/srv/app/.reelroom/data',
      previewDurationS: 30,
    });

    const overridden = resolveSettings(config, '/srv/app', {
      REELROOM_ADMIN_CHAT_ID: '999',
      REELROOM_INTERVAL: '1h',
      REELROOM_DATA_DIR: '/var/reelroom',
      REELROOM_PREVIEW_DURATION: '15',
    });
    expect(overridden).toEqual({
      adminChatId: 999,
      intervalMs: 3_600_000,
      uploadWithoutApproval: false,
      dataDir: '/var/reelroom',
      previewDurationS: 15,
    });
  });

  it('rejects non-numeric overrides', () => {
    ws = createTempWorkspace();
    const config = readWorkspaceConfig(getReelroomPaths(ws.workspaceDir).config);
    expect(() => resolveSettings(config, '/srv/app', { REELROOM_ADMIN_CHAT_ID: 'admin' })).toThrow(
      'REELROOM_ADMIN_CHAT_ID must be a number, got "admin"',
    );
  });
});
