import fs from 'node:fs';
import path from 'node:path';
import type { Request } from 'express';
import type multer from 'multer';
import { errnoCode } from './errors.js';
import type { UploadResult, UploadWriter } from './upload-writer.js';

/**
 * multer storage engine bound to one already-resolved target directory.
 * Results are kept in the order the multipart parser announced the files.
 */
export class UploadStorage implements multer.StorageEngine {
  private readonly writer: UploadWriter;
  private readonly targetDir: string;
  private readonly pending: Promise<UploadResult>[] = [];

  constructor(writer: UploadWriter, targetDir: string) {
    this.writer = writer;
    this.targetDir = targetDir;
  }

  _handleFile(
    _req: Request,
    file: Express.Multer.File,
    callback: (error?: unknown, info?: Partial<Express.Multer.File>) => void
  ): void {
    const task = this.writer.writeFile(this.targetDir, file.originalname, file.stream);
    this.pending.push(task);
    void task.then(
      (result) => {
        if (result.ok) {
          callback(null, { filename: result.filename, size: result.size, path: path.join(this.targetDir, result.filename) });
          return;
        }
        callback(null, { size: 0 });
      },
      (error: unknown) => callback(error)
    );
  }

  _removeFile(_req: Request, file: Express.Multer.File, callback: (error: Error | null) => void): void {
    if (!file.path) {
      callback(null);
      return;
    }
    void fs.promises.unlink(file.path).then(
      () => callback(null),
      (error: unknown) => {
        if (errnoCode(error) === 'ENOENT') {
          callback(null);
          return;
        }
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    );
  }

  results(): Promise<UploadResult[]> {
    return Promise.all(this.pending);
  }
}
