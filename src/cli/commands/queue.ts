import type { Command } from 'commander';
import { requireWorkspace } from '../cli-shared.js';
import { VideoQueue } from '../../queue/video-queue.js';
import { GenerationQueue } from '../../queue/generation-queue.js';

export function registerQueueCommand(program: Command): void {
  const queue = program.command('queue').description('Inspect the persisted queues');

  queue
    .command('list')
    .description('List the approval and generation queues')
    .action(() => {
      const { settings } = requireWorkspace();
      const videos = new VideoQueue(settings.dataDir);
      const requests = new GenerationQueue(settings.dataDir);

      console.log(`\nApproval queue (${videos.size()}/${videos.maxSize}):`);
      for (const [i, v] of videos.list().entries()) {
        console.log(`  ${i + 1}. ${v.title}`);
        console.log(`     Video: ${v.video_path}`);
        console.log(`     Added: ${v.added_at}`);
      }

      console.log(`\nGeneration queue (${requests.size()}/${requests.maxSize}):`);
      for (const [i, r] of requests.list().entries()) {
        const topic = r.autonomous_source ? '(Reddit)' : r.topic;
        console.log(`  ${i + 1}. [${r.status.toUpperCase()}] ${topic}`);
        console.log(`     Chat:    ${r.chat_id}`);
        console.log(`     Created: ${r.created_at}`);
      }
      console.log();
    });

  queue
    .command('clear')
    .description('Empty the approval queue')
    .action(() => {
      const { settings } = requireWorkspace();
      const videos = new VideoQueue(settings.dataDir);
      const removed = videos.size();
      videos.clear();
      console.log(`Cleared ${removed} video(s) from the approval queue.`);
    });
}
