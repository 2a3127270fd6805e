import fs from 'node:fs';
import path from 'node:path';
import { NotADirectoryError, TraversalError, errnoCode } from './errors.js';

function stripLeadingSeparators(requested: string): string {
  return requested.replace(/^[\\/]+/, '');
}

export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  if (relative === '..' || relative.startsWith(`..${path.sep}`)) {
    return false;
  }
  return !path.isAbsolute(relative);
}

/**
 * Follows symlinks for the longest existing prefix of `target` and re-appends
 * the segments that do not exist yet.
 */
export async function canonicalize(target: string): Promise<string> {
  try {
    return await fs.promises.realpath(target);
  } catch (error) {
    const code = errnoCode(error);
    if (code !== 'ENOENT' && code !== 'ENOTDIR') {
      throw error;
    }
    const parent = path.dirname(target);
    if (parent === target) {
      return target;
    }
    return path.join(await canonicalize(parent), path.basename(target));
  }
}

export async function resolveWithinRoot(root: string, requested: string): Promise<string> {
  if (requested.includes('\0')) {
    throw new TraversalError(requested);
  }

  const joined = path.resolve(root, stripLeadingSeparators(requested));
  const resolved = await canonicalize(joined);
  if (!isWithinRoot(root, resolved)) {
    throw new TraversalError(requested);
  }
  return resolved;
}

export function toPortablePath(value: string): string {
  return value.split(path.sep).join('/');
}

export class PathResolver {
  readonly root: string;

  private constructor(root: string) {
    this.root = root;
  }

  static async create(dir: string): Promise<PathResolver> {
    const root = await fs.promises.realpath(path.resolve(dir));
    const stat = await fs.promises.stat(root);
    if (!stat.isDirectory()) {
      throw new NotADirectoryError();
    }
    return new PathResolver(root);
  }

  resolve(requested: string | undefined): Promise<string> {
    return resolveWithinRoot(this.root, requested ?? '');
  }

  relativePath(resolved: string): string {
    return toPortablePath(path.relative(this.root, resolved));
  }
}
