import fs from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { errnoCode, errorMessage } from './errors.js';

export const DEFAULT_UPLOAD_CHUNK_BYTES = 1024 * 1024;
export const INVALID_FILENAME_ERROR = 'Invalid filename';

const WRITE_FLAGS =
  fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_TRUNC | (fs.constants.O_NOFOLLOW ?? 0);

export type UploadSource = Readable | AsyncIterable<Uint8Array | string>;

export interface UploadSink {
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export type UploadSinkFactory = (filePath: string) => Promise<UploadSink>;

export interface IncomingUpload {
  filename: string;
  stream: UploadSource;
}

export type UploadResult =
  | { ok: true; filename: string; size: number }
  | { ok: false; filename: string; error: string };

export interface UploadReport {
  uploaded: Array<{ filename: string; size: number }>;
  errors: Array<{ filename: string; error: string }>;
  success: number;
  failed: number;
}

export interface UploadWriterOptions {
  chunkSize?: number;
  allowHiddenFiles?: boolean;
  openTarget?: UploadSinkFactory;
}

/**
 * Reduces a client-supplied name to its last path segment. Returns null when
 * nothing usable is left, or when the name is hidden and hidden files are not
 * allowed.
 */
export function sanitizeUploadFilename(raw: string, options: { allowHidden?: boolean } = {}): string | null {
  const segments = raw.split(/[\\/]/);
  const name = segments[segments.length - 1] ?? '';
  if (!name || name === '.' || name === '..' || name.includes('\0')) {
    return null;
  }
  if (!options.allowHidden && name.startsWith('.')) {
    return null;
  }
  return name;
}

export async function openFileSink(filePath: string): Promise<UploadSink> {
  const handle = await fs.promises.open(filePath, WRITE_FLAGS, 0o644);
  return {
    async write(chunk: Uint8Array): Promise<void> {
      let offset = 0;
      while (offset < chunk.byteLength) {
        const { bytesWritten } = await handle.write(chunk, offset, chunk.byteLength - offset);
        offset += bytesWritten;
      }
    },
    close: () => handle.close()
  };
}

export function summarizeUploads(results: UploadResult[]): UploadReport {
  const uploaded: UploadReport['uploaded'] = [];
  const errors: UploadReport['errors'] = [];
  for (const result of results) {
    if (result.ok) {
      uploaded.push({ filename: result.filename, size: result.size });
    } else {
      errors.push({ filename: result.filename, error: result.error });
    }
  }
  return {
    uploaded,
    errors,
    success: uploaded.length,
    failed: errors.length
  };
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  throw new TypeError('unsupported upload chunk type');
}

async function drain(source: UploadSource): Promise<void> {
  for await (const chunk of source) {
    void chunk;
  }
}

/**
 * Writes `source` to `sink` in slices of at most `chunkSize` bytes. After a
 * write failure the rest of the source is still consumed, then the failure is
 * rethrown.
 */
async function copyInChunks(source: UploadSource, sink: UploadSink, chunkSize: number): Promise<number> {
  let pending: Buffer = Buffer.alloc(0);
  let written = 0;
  let failure: unknown = null;

  for await (const chunk of source) {
    if (failure !== null) {
      continue;
    }
    const incoming = toBuffer(chunk);
    pending = pending.length === 0 ? incoming : Buffer.concat([pending, incoming]);
    try {
      while (pending.length >= chunkSize) {
        await sink.write(pending.subarray(0, chunkSize));
        written += chunkSize;
        pending = pending.subarray(chunkSize);
      }
    } catch (error) {
      failure = error;
      pending = Buffer.alloc(0);
    }
  }

  if (failure !== null) {
    throw failure;
  }
  if (pending.length > 0) {
    await sink.write(pending);
    written += pending.length;
  }
  return written;
}

export class UploadWriter {
  private readonly chunkSize: number;
  private readonly allowHiddenFiles: boolean;
  private readonly openTarget: UploadSinkFactory;

  constructor(options: UploadWriterOptions = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_UPLOAD_CHUNK_BYTES;
    this.chunkSize = Number.isFinite(chunkSize) && chunkSize > 0 ? Math.floor(chunkSize) : DEFAULT_UPLOAD_CHUNK_BYTES;
    this.allowHiddenFiles = options.allowHiddenFiles ?? false;
    this.openTarget = options.openTarget ?? openFileSink;
  }

  getChunkSize(): number {
    return this.chunkSize;
  }

  /** Never rejects; every failure is reported as an `ok: false` result. */
  async writeFile(targetDir: string, proposedName: string, source: UploadSource): Promise<UploadResult> {
    const filename = sanitizeUploadFilename(proposedName, { allowHidden: this.allowHiddenFiles });
    if (!filename) {
      await drain(source).catch((error) => {
        console.warn(`[lanshare] upload: discarding ${proposedName} failed (${errorMessage(error)})`);
      });
      return { ok: false, filename: proposedName, error: INVALID_FILENAME_ERROR };
    }

    const filePath = path.join(targetDir, filename);
    let sink: UploadSink;
    try {
      sink = await this.openTarget(filePath);
    } catch (error) {
      await drain(source).catch((drainError) => {
        console.warn(`[lanshare] upload: discarding ${proposedName} failed (${errorMessage(drainError)})`);
      });
      return { ok: false, filename: proposedName, error: errorMessage(error) };
    }

    let failure: unknown = null;
    let size = 0;
    try {
      size = await copyInChunks(source, sink, this.chunkSize);
    } catch (error) {
      failure = error;
    }
    try {
      await sink.close();
    } catch (error) {
      if (failure === null) {
        failure = error;
      }
    }

    if (failure !== null) {
      await this.discard(filePath);
      return { ok: false, filename: proposedName, error: errorMessage(failure) };
    }
    return { ok: true, filename, size };
  }

  async write(targetDir: string, files: Iterable<IncomingUpload> | AsyncIterable<IncomingUpload>): Promise<UploadReport> {
    const results: UploadResult[] = [];
    for await (const file of files) {
      results.push(await this.writeFile(targetDir, file.filename, file.stream));
    }
    return summarizeUploads(results);
  }

  private async discard(filePath: string): Promise<void> {
    try {
      await fs.promises.unlink(filePath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        console.warn(`[lanshare] upload: could not remove partial file ${filePath} (${errorMessage(error)})`);
      }
    }
  }
}
