import { spawn, type ChildProcessWithoutNullStreams, type SpawnOptionsWithoutStdio } from 'node:child_process';
import { ArtifactSchema } from '../shared/schemas.js';
import { CancelledError, ProducerError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Artifact } from '../queue/types.js';
import type { Producer } from '../scheduler/types.js';

export interface CommandProducerOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  spawn?: typeof spawn;
}

/**
 * Producer that shells out to an external video pipeline.
 *
 * The command is invoked as `command ...args --topic <topic>` or
 * `command ...args --autonomous`. Its last non-empty stdout line must be the
 * artifact JSON: { video_path, preview_path?, title, script, tags }.
 */
export class CommandProducer implements Producer {
  private readonly spawnImpl: typeof spawn;

  constructor(private readonly opts: CommandProducerOptions) {
    this.spawnImpl = opts.spawn ?? spawn;
  }

  generate(topic: string, signal?: AbortSignal): Promise<Artifact> {
    return this.produce(['--topic', topic], signal);
  }

  generateAutonomous(signal?: AbortSignal): Promise<Artifact> {
    return this.produce(['--autonomous'], signal);
  }

  private async produce(extraArgs: string[], signal?: AbortSignal): Promise<Artifact> {
    if (signal?.aborted) throw new CancelledError();
    const args = [...(this.opts.args ?? []), ...extraArgs];
    logger.debug('Starting producer', { command: this.opts.command, args });

    const stdout = await this.exec(args, signal);
    const line = stdout
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean)
      .pop();
    if (!line) {
      throw new ProducerError('Producer printed no artifact');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      throw new ProducerError(`Producer returned invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = ArtifactSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ProducerError(`Producer returned an invalid artifact: ${issues}`);
    }
    return parsed.data;
  }

  private exec(args: string[], signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = this.spawnImpl(this.opts.command, args, {
        cwd: this.opts.cwd,
        env: this.opts.env ?? process.env,
        stdio: 'pipe',
      } satisfies SpawnOptionsWithoutStdio) as ChildProcessWithoutNullStreams;

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let cancelled = false;

      const onAbort = (): void => {
        cancelled = true;
        child.kill('SIGTERM');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (chunk) => stdoutChunks.push(Buffer.from(chunk)));
      child.stderr.on('data', (chunk) => stderrChunks.push(Buffer.from(chunk)));

      child.on('error', (err) => {
        signal?.removeEventListener('abort', onAbort);
        reject(new ProducerError(`Failed to start producer: ${err.message}`));
      });

      child.on('close', (code) => {
        signal?.removeEventListener('abort', onAbort);
        if (cancelled) return reject(new CancelledError('producer cancelled'));
        const stdoutStr = Buffer.concat(stdoutChunks).toString('utf8');
        const stderrStr = Buffer.concat(stderrChunks).toString('utf8');
        if (code !== 0) {
          const detail = stderrStr.trim().split('\n').pop() || stdoutStr.trim() || 'no output';
          return reject(new ProducerError(`Producer exited with code ${code}: ${detail}`));
        }
        return resolve(stdoutStr);
      });

      child.stdin.end();
    });
  }
}
