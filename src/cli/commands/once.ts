import type { Command } from 'commander';
import { requireWorkspace, buildProducer, buildPublisher } from '../cli-shared.js';
import { errorMessage } from '../../shared/errors.js';
import { shutdownSignal } from './run.js';

export function registerOnceCommand(program: Command): void {
  program
    .command('once')
    .description('Generate one video and exit')
    .option('--topic <topic>', 'Topic to generate a video about')
    .option('--reddit', 'Pick the topic from the autonomous source', false)
    .option('--upload', 'Upload the result to YouTube', false)
    .action(async (opts: { topic?: string; reddit: boolean; upload: boolean }) => {
      const { config } = requireWorkspace();

      if (!opts.topic && !opts.reddit) {
        console.error('Error: pass --topic <topic> or --reddit');
        process.exit(1);
      }

      const signal = shutdownSignal();
      try {
        const producer = buildProducer(config);
        const publisher = opts.upload ? buildPublisher(config) : null;
        if (opts.upload && !publisher) {
          throw new Error(
            'upload requires YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET and YOUTUBE_REFRESH_TOKEN',
          );
        }

        const artifact = opts.topic
          ? await producer.generate(opts.topic, signal)
          : await producer.generateAutonomous(signal);
        console.log(`Generated: ${artifact.title}`);
        console.log(`  Video:   ${artifact.video_path}`);
        if (artifact.preview_path) console.log(`  Preview: ${artifact.preview_path}`);

        if (publisher) {
          const result = await publisher.publish(artifact, signal);
          console.log(`Uploaded: ${result.url}`);
        }
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
