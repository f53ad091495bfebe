import { readFile, writeFile } from 'fs/promises';
import { DocumentError } from '../../errors.js';
import { patchDocument } from './patcher.js';

export type DocumentUpdate =
  | { status: 'changed'; written: boolean; blocksFound: number; text: string }
  | { status: 'unchanged'; blocksFound: number; text: string }
  | { status: 'failed'; error: DocumentError };

/**
 * The file that carries the status block.
 */
export class StatusDocument {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async update(block: string, options: { dryRun?: boolean } = {}): Promise<DocumentUpdate> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      return { status: 'failed', error: new DocumentError('read', this.filePath, error) };
    }

    const patched = patchDocument(content, block);
    if (!patched.changed) {
      return { status: 'unchanged', blocksFound: patched.blocksFound, text: content };
    }

    if (options.dryRun) {
      return { status: 'changed', written: false, blocksFound: patched.blocksFound, text: patched.text };
    }

    try {
      await writeFile(this.filePath, patched.text, 'utf-8');
    } catch (error) {
      return { status: 'failed', error: new DocumentError('write', this.filePath, error) };
    }

    return { status: 'changed', written: true, blocksFound: patched.blocksFound, text: patched.text };
  }
}
