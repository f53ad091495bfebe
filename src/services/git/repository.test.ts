import { describe, test, expect } from 'vitest';
import { RepositorySync, commitMessage } from './repository.js';
import type { CommandRunner } from './command.js';
import { GitCommandError } from '../../errors.js';
import { createLogger, type LogEntry } from '../../logger.js';

const NOW = new Date('2024-05-01T12:00:00Z');

function recordingRunner(failOn?: string): { run: CommandRunner; calls: string[][] } {
  const calls: string[][] = [];
  const run: CommandRunner = async (args) => {
    calls.push(args);
    if (args[0] === failOn) {
      throw new GitCommandError('git', args, { exitCode: 1, signal: null, stderr: 'fatal: remote rejected\n' });
    }
    return { stdout: '', stderr: '' };
  };
  return { run, calls };
}

describe('Repository sync', () => {
  test('commitMessage embeds the timestamp', () => {
    expect(commitMessage(NOW, 'UTC')).toBe('Update Now Playing Information\n\nLast updated: 2024-05-01 12:00:00 UTC');
  });

  test('stages, amends and force-pushes in order', async () => {
    const { run, calls } = recordingRunner();
    const sync = new RepositorySync(run, createLogger({ sink: () => {} }), { timeZone: 'UTC', now: () => NOW });

    const result = await sync.publish('README.md');

    expect(result).toEqual({ ok: true });
    expect(calls).toEqual([
      ['add', '--', 'README.md'],
      ['commit', '--amend', '-m', 'Update Now Playing Information\n\nLast updated: 2024-05-01 12:00:00 UTC'],
      ['push', '--force'],
    ]);
  });

  test('stops at the first failing step and reports it', async () => {
    const { run, calls } = recordingRunner('commit');
    const entries: LogEntry[] = [];
    const sync = new RepositorySync(run, createLogger({ sink: (e) => entries.push(e) }), { timeZone: 'UTC', now: () => NOW });

    const result = await sync.publish('README.md');

    expect(calls.map((args) => args[0])).toEqual(['add', 'commit']);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.step).toBe('amend');
      expect(result.error.stderr).toBe('fatal: remote rejected\n');
    }
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('error');
    expect(entries[0].message).toContain('Git amend failed');
  });

  test('wraps errors that are not git errors', async () => {
    const run: CommandRunner = async () => {
      throw new Error('boom');
    };
    const sync = new RepositorySync(run, createLogger({ sink: () => {} }), { timeZone: 'UTC', now: () => NOW });

    const result = await sync.publish('README.md');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.step).toBe('stage');
      expect(result.error).toBeInstanceOf(GitCommandError);
      expect(result.error.message).toBe('git add -- README.md boom');
    }
  });
});
