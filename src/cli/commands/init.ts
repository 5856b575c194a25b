import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';
import { errorMessage } from '../../shared/errors.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a reelroom workspace in the current directory')
    .option('--admin-chat-id <id>', 'Telegram chat allowed to review videos')
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .action((opts: { adminChatId?: string; force: boolean }) => {
      let adminChatId: number | undefined;
      if (opts.adminChatId !== undefined) {
        adminChatId = Number(opts.adminChatId);
        if (!Number.isInteger(adminChatId)) {
          console.error(`Invalid chat id: ${opts.adminChatId}`);
          process.exit(1);
        }
      }

      try {
        const config = initWorkspace({ force: opts.force, adminChatId });
        console.log(`\nWorkspace initialized!`);
        console.log(`  Data dir:    ${config.data_dir}`);
        console.log(`  Admin chat:  ${config.telegram.admin_chat_id || '(none)'}`);
        console.log(`  Interval:    ${config.scheduler.interval}`);
        console.log(`\nNext steps:`);
        console.log(`  set producer.command in .reelroom/config.yaml`);
        console.log(`  export TELEGRAM_BOT_TOKEN, then: reelroom chat-id`);
        console.log(`  reelroom run   – start the scheduler and review bot`);
      } catch (err) {
        console.error(`Init failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
