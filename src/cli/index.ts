#!/usr/bin/env node
import { Command } from 'commander';
import { loadWorkspaceEnv } from '../workspace/env.js';
import { setLogLevel } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { registerInitCommand } from './commands/init.js';
import { registerRunCommand } from './commands/run.js';
import { registerOnceCommand } from './commands/once.js';
import { registerQueueCommand } from './commands/queue.js';
import { registerChatIdCommand } from './commands/chat-id.js';

loadWorkspaceEnv();

const program = new Command();

program
  .name('reelroom')
  .description('reelroom – short-form video generation with chat approval')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable debug logging', false)
  .hook('preAction', (cmd) => {
    if (cmd.opts<{ verbose: boolean }>().verbose) setLogLevel('debug');
  });

registerInitCommand(program);
registerRunCommand(program);
registerOnceCommand(program);
registerQueueCommand(program);
registerChatIdCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
