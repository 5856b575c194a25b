import type { Command } from 'commander';
import { requireWorkspace, buildProducer, buildPublisher, buildTelegramClient } from '../cli-shared.js';
import { ApprovalService } from '../../approval/service.js';
import { Scheduler } from '../../scheduler/scheduler.js';
import type { CommandProducer } from '../../producer/command-producer.js';
import { parseDuration } from '../../shared/duration.js';
import { errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';

/** Abort the returned signal on SIGINT or SIGTERM. */
export function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = (sig: NodeJS.Signals) => {
    logger.info('Received shutdown signal', { signal: sig });
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the scheduler and the Telegram review bot')
    .option('--interval <duration>', 'Generation interval (e.g. 15m, 1h)')
    .option('--upload', 'Upload every generated video without approval', false)
    .action(async (opts: { interval?: string; upload: boolean }) => {
      const { config, settings } = requireWorkspace();

      let intervalMs = settings.intervalMs;
      let producer: CommandProducer;
      try {
        if (opts.interval) intervalMs = parseDuration(opts.interval);
        producer = buildProducer(config);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }

      const upload = opts.upload || settings.uploadWithoutApproval;
      const publisher = buildPublisher(config);
      if (upload && !publisher) {
        console.error(
          'Error: upload requires YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET and YOUTUBE_REFRESH_TOKEN',
        );
        process.exit(1);
      }

      const transport = buildTelegramClient();
      let approval: ApprovalService | null = null;
      if (transport && !upload && !publisher) {
        logger.warn('YouTube credentials not set; approval flow disabled', {
          missing: 'YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET or YOUTUBE_REFRESH_TOKEN',
        });
      } else if (transport && !upload) {
        approval = new ApprovalService({
          transport,
          dataDir: settings.dataDir,
          adminChatId: settings.adminChatId,
          previewDurationS: settings.previewDurationS,
        });
      } else if (!transport && !upload) {
        logger.warn('TELEGRAM_BOT_TOKEN not set; approval flow disabled');
      }

      const scheduler = new Scheduler({
        producer,
        publisher,
        approval,
        intervalMs,
        uploadWithoutApproval: upload,
      });
      await scheduler.run(shutdownSignal());
    });
}
