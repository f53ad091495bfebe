import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { StatusDocument } from './readme.js';
import { DocumentError } from '../../errors.js';

const writes = vi.hoisted(() => {
  const state: { failure?: Error } = {};
  return state;
});

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    writeFile: async (...args: Parameters<typeof actual.writeFile>) => {
      if (writes.failure) {
        throw writes.failure;
      }
      return actual.writeFile(...args);
    },
  };
});

const BLOCK = '> **Now Playing:** Song - Artist [Album]\n> \n> [Last.fm](url) | Updated: 2024-05-01 12:00:00 UTC';

describe('Status document', () => {
  const testRoot = path.join(os.tmpdir(), `now-playing-doc-test-${process.pid}-${Date.now()}`);
  const readmePath = path.join(testRoot, 'README.md');

  beforeEach(() => {
    fs.mkdirSync(testRoot, { recursive: true });
  });

  afterEach(() => {
    writes.failure = undefined;
    fs.rmSync(testRoot, { recursive: true, force: true });
  });

  test('writes the patched text when it changed', async () => {
    fs.writeFileSync(readmePath, '# Profile\n');
    const document = new StatusDocument(readmePath);

    const update = await document.update(BLOCK);

    expect(update).toEqual({ status: 'changed', written: true, blocksFound: 0, text: `# Profile\n\n${BLOCK}` });
    expect(fs.readFileSync(readmePath, 'utf-8')).toBe(`# Profile\n\n${BLOCK}`);
  });

  test('does not touch the file when nothing changed', async () => {
    fs.writeFileSync(readmePath, `# Profile\n\n${BLOCK}`);
    const before = fs.statSync(readmePath).mtimeMs;
    const document = new StatusDocument(readmePath);

    const update = await document.update(BLOCK);

    expect(update).toEqual({ status: 'unchanged', blocksFound: 1, text: `# Profile\n\n${BLOCK}` });
    expect(fs.statSync(readmePath).mtimeMs).toBe(before);
  });

  test('dry run reports the change without writing', async () => {
    fs.writeFileSync(readmePath, '# Profile\n');
    const document = new StatusDocument(readmePath);

    const update = await document.update(BLOCK, { dryRun: true });

    expect(update.status).toBe('changed');
    expect(update.status === 'changed' && update.written).toBe(false);
    expect(fs.readFileSync(readmePath, 'utf-8')).toBe('# Profile\n');
  });

  test('reports a missing file as a read failure', async () => {
    const document = new StatusDocument(path.join(testRoot, 'missing.md'));

    const update = await document.update(BLOCK);

    expect(update.status).toBe('failed');
    if (update.status === 'failed') {
      expect(update.error).toBeInstanceOf(DocumentError);
      expect(update.error.operation).toBe('read');
    }
  });

  test('reports a failed write and leaves the file as it was', async () => {
    fs.writeFileSync(readmePath, '# Profile\n');
    writes.failure = new Error('ENOSPC: no space left on device');
    const document = new StatusDocument(readmePath);

    const update = await document.update(BLOCK);

    expect(update.status).toBe('failed');
    if (update.status === 'failed') {
      expect(update.error.operation).toBe('write');
      expect(update.error.filePath).toBe(readmePath);
      expect(update.error.message).toBe(`Failed to write ${readmePath}: ENOSPC: no space left on device`);
    }
    expect(fs.readFileSync(readmePath, 'utf-8')).toBe('# Profile\n');
  });
});
