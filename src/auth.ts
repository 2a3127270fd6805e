import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { AuthError, ConfigError, respondError } from './errors.js';

export interface Credentials {
  username: string;
  password: string;
}

export type AuthFailureReason = 'missing' | 'malformed' | 'mismatch';

export interface BasicAuthMiddlewareHooks {
  onFailure?: (req: Request, reason: AuthFailureReason) => void;
  onSuccess?: (req: Request, username: string) => void;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

// timingSafeEqual needs equal lengths; digests always are.
function secureEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export class CredentialGate {
  private readonly credentials: Credentials | null;

  constructor(credentials?: Credentials | null) {
    this.credentials = credentials ?? null;
  }

  enabled(): boolean {
    return this.credentials !== null;
  }

  getUsername(): string | null {
    return this.credentials?.username ?? null;
  }

  verify(supplied: Credentials): boolean {
    if (!this.credentials) {
      return true;
    }
    const usernameOk = secureEqual(supplied.username, this.credentials.username);
    const passwordOk = secureEqual(supplied.password, this.credentials.password);
    return usernameOk && passwordOk;
  }
}

export function parseAuthString(raw: string): Credentials {
  const idx = raw.indexOf(':');
  if (idx < 0) {
    throw new ConfigError("invalid auth format, use 'username:password'");
  }
  const username = raw.slice(0, idx);
  const password = raw.slice(idx + 1);
  if (!username || !password) {
    throw new ConfigError('username and password cannot be empty');
  }
  return { username, password };
}

export function parseBasicAuthHeader(raw: unknown): Credentials | null {
  if (typeof raw !== 'string') {
    return null;
  }
  const value = raw.trim();
  const prefix = 'basic ';
  if (!value.toLowerCase().startsWith(prefix)) {
    return null;
  }
  const decoded = Buffer.from(value.slice(prefix.length).trim(), 'base64').toString('utf8');
  const idx = decoded.indexOf(':');
  if (idx < 0) {
    return null;
  }
  return {
    username: decoded.slice(0, idx),
    password: decoded.slice(idx + 1)
  };
}

export function createBasicAuthMiddleware(gate: CredentialGate, hooks: BasicAuthMiddlewareHooks = {}) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!gate.enabled()) {
      next();
      return;
    }

    const header = req.headers.authorization;
    if (!header) {
      hooks.onFailure?.(req, 'missing');
      respondError(res, new AuthError('authentication required'));
      return;
    }

    const supplied = parseBasicAuthHeader(header);
    if (!supplied) {
      hooks.onFailure?.(req, 'malformed');
      respondError(res, new AuthError('malformed authorization header'));
      return;
    }

    if (!gate.verify(supplied)) {
      hooks.onFailure?.(req, 'mismatch');
      respondError(res, new AuthError());
      return;
    }

    res.locals.username = supplied.username;
    hooks.onSuccess?.(req, supplied.username);
    next();
  };
}

export function getClientIp(req: Request): string {
  if (req.ip) {
    return req.ip;
  }
  return req.socket.remoteAddress || 'unknown';
}
