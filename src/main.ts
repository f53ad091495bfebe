#!/usr/bin/env node

import { Command } from 'commander';
import dotenv from 'dotenv';
import pc from 'picocolors';
import { createPollLoop } from './app.js';
import { loadConfig, startupErrorMessage, type Config } from './config/index.js';
import { errorMessage } from './errors.js';
import { createLogger, logPollStart, type Logger } from './logger.js';

dotenv.config();

function startup(): { config: Config; logger: Logger } {
  try {
    const config = loadConfig();
    return { config, logger: createLogger({ level: config.log.level }) };
  } catch (error) {
    createLogger().error(startupErrorMessage(error));
    process.exit(1);
  }
}

async function pollCommand(): Promise<void> {
  const { config, logger } = startup();
  const loop = createPollLoop(config, logger);

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  logPollStart(logger, {
    username: config.lastfm.username,
    repositoryPath: config.repository.path,
    documentFile: config.repository.documentFile,
    intervalMs: config.poll.intervalMs,
  });

  await loop.run(controller.signal);
}

async function onceCommand(opts: { dryRun?: boolean }): Promise<void> {
  const { config, logger } = startup();
  const loop = createPollLoop(config, logger, { dryRun: opts.dryRun });
  const outcome = await loop.runCycle();

  if (outcome.status === 'dry-run') {
    console.log(pc.dim('Block that would be written:'));
    console.log(outcome.block);
    if (!outcome.documentChanged) {
      console.log(pc.dim('The document already shows this block.'));
    }
  }

  process.exitCode = outcome.status === 'fetch-failed' || outcome.status === 'publish-failed' ? 1 : 0;
}

const program = new Command();

program
  .name('now-playing-sync')
  .description('Keep the Now Playing block of a README in step with Last.fm')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Poll Last.fm every minute and publish track changes')
  .action(pollCommand);

program
  .command('once')
  .description('Run a single poll cycle and exit')
  .option('--dry-run', 'Fetch and render the block without touching the document or git')
  .action(onceCommand);

program.parseAsync().catch((e: unknown) => {
  console.error(pc.red('Error:'), errorMessage(e));
  process.exit(1);
});
