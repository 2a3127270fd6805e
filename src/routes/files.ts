import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { Application, Request, RequestHandler, Response } from 'express';
import { lookup as mimeLookup } from 'mime-types';
import multer from 'multer';
import type { AuditLogger, AuditRecord } from '../audit-log.js';
import { getClientIp } from '../auth.js';
import {
  InvalidRequestError,
  NotADirectoryError,
  NotAFileError,
  errorMessage,
  respondError
} from '../errors.js';
import { listDirectory, type ListDirectoryOptions } from '../listing.js';
import type { PathResolver } from '../path-resolver.js';
import { UploadStorage } from '../upload-storage.js';
import { summarizeUploads, type UploadWriter } from '../upload-writer.js';

export const UPLOAD_FIELD = 'files';

const DOWNLOAD_HIGH_WATER_MARK = 64 * 1024;

export interface FileRouteDeps {
  resolver: PathResolver;
  writer: UploadWriter;
  authEnabled: boolean;
  audit: AuditLogger | null;
  listOptions?: ListDirectoryOptions;
}

function readStringQuery(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return typeof value[0] === 'string' ? value[0] : undefined;
  }
  return undefined;
}

function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\w.\-]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

function resolveAuditActor(req: Request, res: Response): string {
  const username: unknown = res.locals.username;
  if (typeof username === 'string' && username.length > 0) {
    return `user:${username}`;
  }
  return `ip:${getClientIp(req)}`;
}

function runMiddleware(handler: RequestHandler, req: Request, res: Response): Promise<void> {
  return new Promise((resolve, reject) => {
    handler(req, res, (error?: unknown) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function sendFile(res: Response, filePath: string): Promise<number> {
  const handle = await fs.promises.open(filePath, 'r');
  let size: number;
  try {
    const stat = await handle.stat();
    if (!stat.isFile()) {
      throw new NotAFileError();
    }
    size = stat.size;
  } catch (error) {
    await handle.close();
    throw error;
  }

  res.setHeader('Content-Type', mimeLookup(filePath) || 'application/octet-stream');
  res.setHeader('Content-Length', String(size));
  res.setHeader('Content-Disposition', contentDisposition(path.basename(filePath)));

  // pipeline destroys the read stream, closing the handle, when the client goes away
  await pipeline(handle.createReadStream({ highWaterMark: DOWNLOAD_HIGH_WATER_MARK }), res);
  return size;
}

export function registerFileRoutes(app: Application, deps: FileRouteDeps): void {
  const { resolver, writer, authEnabled, audit } = deps;

  const auditEvent = (req: Request, res: Response, entry: AuditRecord & { resource: string }): void => {
    if (!audit) {
      return;
    }
    void audit.log({ ...entry, actor: resolveAuditActor(req, res) });
  };

  const download = async (req: Request, res: Response, requested: string, filePath: string): Promise<void> => {
    const bytes = await sendFile(res, filePath);
    auditEvent(req, res, {
      event: 'fs.download',
      resource: resolver.relativePath(filePath),
      outcome: 'success',
      metadata: { bytes, requested }
    });
  };

  app.get('/api/list', async (req: Request, res: Response) => {
    const requested = readStringQuery(req.query.path) ?? '';
    try {
      const target = await resolver.resolve(requested);
      const stat = await fs.promises.stat(target);
      if (!stat.isDirectory()) {
        await download(req, res, requested, target);
        return;
      }

      const listing = await listDirectory(resolver, target, deps.listOptions);
      auditEvent(req, res, {
        event: 'fs.list',
        resource: listing.path,
        outcome: 'success',
        metadata: { entries: listing.entries.length }
      });
      res.json({ ...listing, authEnabled });
    } catch (error) {
      auditEvent(req, res, {
        event: 'fs.list',
        resource: requested,
        outcome: 'failure',
        metadata: { reason: errorMessage(error) }
      });
      respondError(res, error);
    }
  });

  app.get('/api/download', async (req: Request, res: Response) => {
    const requested = readStringQuery(req.query.path) ?? '';
    try {
      const target = await resolver.resolve(requested);
      await download(req, res, requested, target);
    } catch (error) {
      auditEvent(req, res, {
        event: 'fs.download',
        resource: requested,
        outcome: 'failure',
        metadata: { reason: errorMessage(error) }
      });
      respondError(res, error);
    }
  });

  app.post('/api/upload', async (req: Request, res: Response) => {
    const requested = readStringQuery(req.query.path) ?? '';
    try {
      const targetDir = await resolver.resolve(requested);
      const stat = await fs.promises.stat(targetDir);
      if (!stat.isDirectory()) {
        throw new NotADirectoryError();
      }

      const storage = new UploadStorage(writer, targetDir);
      // busboy would otherwise decode plain filename="..." parameters as latin1
      await runMiddleware(multer({ storage, defParamCharset: 'utf8' }).array(UPLOAD_FIELD), req, res);
      const results = await storage.results();
      if (results.length === 0) {
        throw new InvalidRequestError(`no files in field "${UPLOAD_FIELD}"`);
      }

      const relativeDir = resolver.relativePath(targetDir);
      for (const result of results) {
        const resource = relativeDir ? `${relativeDir}/${result.filename}` : result.filename;
        if (result.ok) {
          auditEvent(req, res, { event: 'fs.upload', resource, outcome: 'success', metadata: { bytes: result.size } });
        } else {
          auditEvent(req, res, { event: 'fs.upload', resource, outcome: 'failure', metadata: { reason: result.error } });
        }
      }
      res.json(summarizeUploads(results));
    } catch (error) {
      const failure =
        error instanceof multer.MulterError ? new InvalidRequestError(`${error.message} (${error.code})`) : error;
      auditEvent(req, res, {
        event: 'fs.upload',
        resource: requested,
        outcome: 'failure',
        metadata: { reason: errorMessage(failure) }
      });
      respondError(res, failure);
    }
  });
}
