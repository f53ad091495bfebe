import { documentPath, type Config } from './config/index.js';
import type { Logger } from './logger.js';
import { StatusDocument } from './services/document/index.js';
import { RepositorySync, createGitRunner } from './services/git/index.js';
import { LastfmClient } from './services/lastfm/index.js';
import { PollLoop } from './services/poll/index.js';

/**
 * Wire the Last.fm client, the README and the git checkout into a poll loop.
 */
export function createPollLoop(config: Config, logger: Logger, options: { dryRun?: boolean } = {}): PollLoop {
  const source = new LastfmClient(config.lastfm, logger);
  const document = new StatusDocument(documentPath(config));
  const publisher = new RepositorySync(
    createGitRunner(config.repository.path, config.repository.gitTimeoutMs),
    logger,
    { timeZone: config.display.timeZone }
  );

  return new PollLoop({
    source,
    document,
    publisher,
    logger,
    documentFile: config.repository.documentFile,
    timeZone: config.display.timeZone,
    intervalMs: config.poll.intervalMs,
    dryRun: options.dryRun,
  });
}
