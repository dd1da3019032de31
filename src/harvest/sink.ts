import fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { CommentRecord } from './types.js';
import { SinkError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';

export interface CommentSinkOptions {
  outputDir?: string;
  filePrefix?: string;
}

export interface SinkHandle {
  readonly path: string;
  readonly written: number;
  append(record: CommentRecord): Promise<void>;
  close(): Promise<void>;
}

function singleLine(value: string): string {
  return value.replace(/\r?\n|\r/g, ' ');
}

export function formatComment(record: CommentRecord): string {
  return `Comment from ${singleLine(record.authorDisplayName)}: ${singleLine(record.text)}\n`;
}

class FileSinkHandle implements SinkHandle {
  private closed = false;
  private count = 0;

  constructor(
    readonly path: string,
    private readonly file: FileHandle,
  ) {}

  get written(): number {
    return this.count;
  }

  async append(record: CommentRecord): Promise<void> {
    if (this.closed) {
      throw new SinkError(`Sink already closed: ${this.path}`, { path: this.path });
    }
    // one write per record; O_APPEND keeps concurrent writers from tearing lines
    try {
      await this.file.write(formatComment(record));
    } catch (err) {
      throw new SinkError(`Error writing to file: ${errorMessage(err)}`, { path: this.path });
    }
    this.count++;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.file.close();
    } catch (err) {
      throw new SinkError(`Error closing file: ${errorMessage(err)}`, { path: this.path });
    }
  }
}

/**
 * Per-video append-only output files.
 */
export class CommentSink {
  readonly outputDir: string;
  readonly filePrefix: string;

  constructor(options: CommentSinkOptions = {}) {
    this.outputDir = resolvePath(options.outputDir ?? '.');
    this.filePrefix = options.filePrefix ?? 'comments';
  }

  targetPath(videoId: string): string {
    return path.join(this.outputDir, `${this.filePrefix}_${videoId}.txt`);
  }

  async open(videoId: string): Promise<SinkHandle> {
    const target = this.targetPath(videoId);
    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      const file = await fs.open(target, 'a', 0o644);
      return new FileSinkHandle(target, file);
    } catch (err) {
      throw new SinkError(`Error opening output file: ${errorMessage(err)}`, { path: target, videoId });
    }
  }
}

/**
 * Open the sink for `videoId`, run `fn`, and close the file on every exit path.
 * When `fn` fails, a failure to close is logged and `fn`'s error is rethrown.
 */
export async function withSink<T>(
  sink: CommentSink,
  videoId: string,
  fn: (handle: SinkHandle) => Promise<T>,
): Promise<T> {
  const handle = await sink.open(videoId);
  let result: T;
  try {
    result = await fn(handle);
  } catch (err) {
    try {
      await handle.close();
    } catch (closeErr) {
      logger.warn({ videoId, path: handle.path, error: errorMessage(closeErr) }, 'Error closing output file');
    }
    throw err;
  }
  await handle.close();
  return result;
}
