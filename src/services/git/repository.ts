import { GitCommandError, errorMessage } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { formatTimestamp } from '../../utils/index.js';
import type { CommandRunner } from './command.js';

export type PublishStep = 'stage' | 'amend' | 'push';

export type PublishResult =
  | { ok: true }
  | { ok: false; step: PublishStep; error: GitCommandError };

export interface Publisher {
  publish(fileName: string): Promise<PublishResult>;
}

export interface RepositorySyncOptions {
  timeZone: string;
  now?: () => Date;
}

export function commitMessage(updatedAt: Date, timeZone: string): string {
  return `Update Now Playing Information\n\nLast updated: ${formatTimestamp(updatedAt, timeZone)}`;
}

/**
 * Folds each update into the tip commit and force-pushes it, so the branch
 * never grows. Assumes this process is the only writer of the branch.
 */
export class RepositorySync implements Publisher {
  private run: CommandRunner;
  private logger: Logger;
  private timeZone: string;
  private now: () => Date;

  constructor(run: CommandRunner, logger: Logger, options: RepositorySyncOptions) {
    this.run = run;
    this.logger = logger;
    this.timeZone = options.timeZone;
    this.now = options.now ?? (() => new Date());
  }

  async publish(fileName: string): Promise<PublishResult> {
    const steps: Array<[PublishStep, string[]]> = [
      ['stage', ['add', '--', fileName]],
      ['amend', ['commit', '--amend', '-m', commitMessage(this.now(), this.timeZone)]],
      ['push', ['push', '--force']],
    ];

    for (const [step, args] of steps) {
      try {
        await this.run(args);
      } catch (error) {
        const gitError = error instanceof GitCommandError
          ? error
          : new GitCommandError('git', args, { exitCode: null, signal: null, stderr: '', reason: errorMessage(error) });
        this.logger.error(`Git ${step} failed: ${gitError.message}`);
        return { ok: false, step, error: gitError };
      }
      this.logger.debug(`git ${step} done`);
    }

    return { ok: true };
  }
}
