import fs from 'node:fs';
import path from 'node:path';
import type { AuthFailureReason } from './auth.js';
import { errorMessage } from './errors.js';

interface FsSuccessMetadata {
  'fs.list': { entries: number };
  'fs.download': { bytes: number; requested: string };
  'fs.upload': { bytes: number };
}

type FsEvent = keyof FsSuccessMetadata;

type FsRecord = {
  [E in FsEvent]:
    | { event: E; outcome: 'success'; metadata: FsSuccessMetadata[E] }
    | { event: E; outcome: 'failure'; metadata: { reason: string } };
}[FsEvent];

/** What happened, correlated with the metadata each outcome carries. */
export type AuditRecord =
  | { event: 'auth.failure'; outcome: 'failure'; metadata: { reason: AuthFailureReason } }
  | FsRecord;

export type AuditEvent = AuditRecord['event'];

export type AuditLogEntry = AuditRecord & {
  timestamp?: string;
  actor: string;
  resource?: string;
};

export interface AuditLoggerOptions {
  dir: string;
  retentionDays?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_FILE_RE = /^\d{4}-\d{2}-\d{2}\.jsonl$/;
const DEFAULT_RETENTION_DAYS = 90;

function dayFileName(timestamp: string): string {
  const day = /^\d{4}-\d{2}-\d{2}/.test(timestamp) ? timestamp.slice(0, 10) : new Date().toISOString().slice(0, 10);
  return `${day}.jsonl`;
}

/** Removes day files last modified before `now - retentionDays`; returns the names removed. */
export function pruneAuditFiles(dir: string, retentionDays: number, now = Date.now()): string[] {
  let files: string[];
  try {
    files = fs.readdirSync(dir);
  } catch (error) {
    console.warn(`[lanshare] audit: cannot read ${dir} (${errorMessage(error)})`);
    return [];
  }

  const cutoffMs = now - retentionDays * DAY_MS;
  const removed: string[] = [];
  for (const file of files.filter((name) => DAY_FILE_RE.test(name))) {
    const filePath = path.join(dir, file);
    try {
      if (fs.statSync(filePath).mtimeMs < cutoffMs) {
        fs.unlinkSync(filePath);
        removed.push(file);
      }
    } catch (error) {
      console.warn(`[lanshare] audit: retention cleanup skipped ${file} (${errorMessage(error)})`);
    }
  }
  return removed;
}

export class AuditLogger {
  private readonly dir: string;
  private readonly retentionDays: number;
  private lastPruneAt = 0;
  // appends are chained so lines land in the order log() was called
  private tail: Promise<void> = Promise.resolve();

  constructor(options: AuditLoggerOptions) {
    this.dir = path.resolve(options.dir);
    this.retentionDays = Math.max(1, Math.min(3650, options.retentionDays ?? DEFAULT_RETENTION_DAYS));
    fs.mkdirSync(this.dir, { recursive: true });
    this.prune();
  }

  getDir(): string {
    return this.dir;
  }

  /** Resolves once the line is appended; write failures are warned, not thrown. */
  log(entry: AuditLogEntry): Promise<void> {
    const timestamp = entry.timestamp ?? new Date().toISOString();
    const line = JSON.stringify({
      timestamp,
      event: entry.event,
      actor: entry.actor,
      resource: entry.resource ?? '',
      outcome: entry.outcome,
      metadata: entry.metadata
    });

    if (Date.now() - this.lastPruneAt > DAY_MS / 2) {
      this.prune();
    }

    const target = path.join(this.dir, dayFileName(timestamp));
    const write = this.tail.then(() => this.append(target, line));
    this.tail = write;
    return write;
  }

  private async append(target: string, line: string): Promise<void> {
    try {
      await fs.promises.appendFile(target, `${line}\n`, { encoding: 'utf8', mode: 0o600 });
    } catch (error) {
      console.warn(`[lanshare] audit: write failed (${errorMessage(error)})`);
    }
  }

  private prune(): void {
    this.lastPruneAt = Date.now();
    pruneAuditFiles(this.dir, this.retentionDays);
  }
}
