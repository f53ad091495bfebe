import type { DocumentError, FetchError, GitCommandError } from '../../errors.js';
import { errorMessage } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { sleep } from '../../utils/index.js';
import type { DocumentUpdate } from '../document/readme.js';
import { renderStatusBlock } from '../document/status-block.js';
import type { Publisher, PublishStep } from '../git/repository.js';
import type { TrackRecord, TrackSource } from '../lastfm/types.js';
import { fingerprintTrack, NO_TRACK_FINGERPRINT, type Fingerprint } from './fingerprint.js';

export interface DocumentTarget {
  update(block: string, options?: { dryRun?: boolean }): Promise<DocumentUpdate>;
}

export interface PollLoopOptions {
  source: TrackSource;
  document: DocumentTarget;
  publisher: Publisher;
  logger: Logger;
  /** File name handed to git, relative to the repository root */
  documentFile: string;
  timeZone: string;
  intervalMs: number;
  dryRun?: boolean;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type CycleOutcome =
  | { status: 'fetch-failed'; error: FetchError }
  | { status: 'unchanged'; fingerprint: Fingerprint }
  | { status: 'already-current'; track: TrackRecord; fingerprint: Fingerprint }
  | { status: 'dry-run'; track: TrackRecord; block: string; text: string; documentChanged: boolean }
  | { status: 'published'; track: TrackRecord; fingerprint: Fingerprint }
  | { status: 'publish-failed'; track: TrackRecord; step: 'document' | PublishStep; error: DocumentError | GitCommandError };

function describeTrack(track: TrackRecord): string {
  return `${track.name} - ${track.artist} [${track.album}]`;
}

/**
 * Fetch, compare, publish, sleep. One cycle at a time; the last published
 * fingerprint lives only in memory.
 */
export class PollLoop {
  private options: PollLoopOptions;
  private logger: Logger;
  private now: () => Date;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private publishedFingerprint: Fingerprint = NO_TRACK_FINGERPRINT;
  // the document was rewritten but git did not get it out
  private pendingPublish = false;

  constructor(options: PollLoopOptions) {
    this.options = options;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  get lastFingerprint(): Fingerprint {
    return this.publishedFingerprint;
  }

  async runCycle(): Promise<CycleOutcome> {
    const fetched = await this.options.source.fetchCurrentTrack();
    if (!fetched.ok) {
      this.logger.warn('Failed to get track information.');
      return { status: 'fetch-failed', error: fetched.error };
    }

    const { track } = fetched;
    const fingerprint = fingerprintTrack(track);
    if (fingerprint === this.publishedFingerprint) {
      this.logger.debug("Track hasn't changed. Skipping update.");
      return { status: 'unchanged', fingerprint };
    }

    this.logger.info(`Now playing: ${describeTrack(track)}`);
    const block = renderStatusBlock(track, this.now(), this.options.timeZone);
    const update = await this.options.document.update(block, { dryRun: this.options.dryRun });

    if (update.status === 'failed') {
      this.logger.error(`Error updating document: ${update.error.message}`);
      return { status: 'publish-failed', track, step: 'document', error: update.error };
    }

    if (update.blocksFound > 1) {
      this.logger.warn(`Found ${update.blocksFound} Now Playing blocks; only the first one is updated.`);
    }

    if (this.options.dryRun) {
      return { status: 'dry-run', track, block, text: update.text, documentChanged: update.status === 'changed' };
    }

    if (update.status === 'unchanged' && !this.pendingPublish) {
      this.logger.info('No changes detected. Skipping update.');
      this.publishedFingerprint = fingerprint;
      return { status: 'already-current', track, fingerprint };
    }

    if (update.status === 'changed') {
      this.pendingPublish = true;
    }

    const published = await this.options.publisher.publish(this.options.documentFile);
    if (!published.ok) {
      return { status: 'publish-failed', track, step: published.step, error: published.error };
    }

    this.pendingPublish = false;
    this.publishedFingerprint = fingerprint;
    this.logger.info("Repository updated with amended 'Now Playing' information.");
    return { status: 'published', track, fingerprint };
  }

  /**
   * Poll until `signal` aborts. Cycles start `intervalMs` apart; an abort
   * lets the running cycle finish and cuts the sleep short.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      const startedAt = this.now().getTime();
      try {
        await this.runCycle();
      } catch (error) {
        this.logger.error(`Unexpected error during poll cycle: ${errorMessage(error)}`);
      }

      if (signal?.aborted) break;
      const elapsed = this.now().getTime() - startedAt;
      await this.sleep(Math.max(0, this.options.intervalMs - elapsed), signal);
    }
    this.logger.info('Polling stopped.');
  }
}
