import type { Command } from 'commander';
import { buildTelegramClient } from '../cli-shared.js';
import { errorMessage } from '../../shared/errors.js';

export function registerChatIdCommand(program: Command): void {
  program
    .command('chat-id')
    .description('Print the id of the last chat that messaged the bot')
    .action(async () => {
      const client = buildTelegramClient();
      if (!client) {
        console.error('Error: TELEGRAM_BOT_TOKEN is not set');
        process.exit(1);
      }

      try {
        const { chatId, name } = await client.getChatId();
        console.log(`Chat ID: ${chatId}`);
        if (name) console.log(`Name:    ${name}`);
        console.log(`\nSet it with: reelroom init --admin-chat-id ${chatId} --force`);
        console.log(`or export REELROOM_ADMIN_CHAT_ID=${chatId}`);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
