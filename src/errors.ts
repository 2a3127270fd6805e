import type { Response } from 'express';

export type FileServerErrorCode =
  | 'forbidden'
  | 'unauthorized'
  | 'not_found'
  | 'not_a_file'
  | 'not_a_directory'
  | 'permission_denied'
  | 'invalid_request';

export class FileServerError extends Error {
  readonly status: number;
  readonly code: FileServerErrorCode;

  constructor(status: number, code: FileServerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class TraversalError extends FileServerError {
  readonly requested: string;

  constructor(requested: string) {
    super(403, 'forbidden', 'access denied: path escapes the served directory');
    this.requested = requested;
  }
}

export class AuthError extends FileServerError {
  constructor(message = 'invalid credentials') {
    super(401, 'unauthorized', message);
  }
}

export class NotFoundError extends FileServerError {
  constructor(message = 'path not found') {
    super(404, 'not_found', message);
  }
}

export class NotAFileError extends FileServerError {
  constructor() {
    super(400, 'not_a_file', 'path is not a file');
  }
}

export class NotADirectoryError extends FileServerError {
  constructor() {
    super(400, 'not_a_directory', 'path is not a directory');
  }
}

export class PermissionDeniedError extends FileServerError {
  constructor() {
    super(403, 'permission_denied', 'permission denied');
  }
}

export class InvalidRequestError extends FileServerError {
  constructor(message: string) {
    super(400, 'invalid_request', message);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined;
  }
  const code: unknown = error.code;
  return typeof code === 'string' ? code : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Maps filesystem errno failures onto the request-level taxonomy. */
export function toFileServerError(error: unknown): FileServerError | null {
  if (error instanceof FileServerError) {
    return error;
  }
  const code = errnoCode(error);
  if (code === 'ENOENT') {
    return new NotFoundError();
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return new PermissionDeniedError();
  }
  if (code === 'ENOTDIR') {
    return new NotADirectoryError();
  }
  if (code === 'EISDIR') {
    return new NotAFileError();
  }
  if (code === 'ELOOP') {
    return new InvalidRequestError('too many levels of symbolic links');
  }
  return null;
}

export function respondError(res: Response, error: unknown): void {
  if (res.headersSent) {
    res.destroy();
    return;
  }

  const known = toFileServerError(error);
  if (!known) {
    console.error(`[lanshare] request failed: ${errorMessage(error)}`);
    res.status(500).json({ error: 'internal server error', code: 'internal' });
    return;
  }

  if (known instanceof AuthError) {
    res.setHeader('WWW-Authenticate', 'Basic realm="lanshare"');
  }
  res.status(known.status).json({ error: known.message, code: known.code });
}
