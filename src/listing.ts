import fs from 'node:fs';
import path from 'node:path';
import type { PathResolver } from './path-resolver.js';

export type EntryType = 'dir' | 'file';

export interface DirectoryEntry {
  name: string;
  path: string;
  type: EntryType;
  size: number;
  modified: string;
}

export interface Breadcrumb {
  name: string;
  path: string;
}

export interface DirectoryListing {
  path: string;
  parent: string | null;
  breadcrumbs: Breadcrumb[];
  entries: DirectoryEntry[];
}

export type EntryComparator = (left: DirectoryEntry, right: DirectoryEntry) => number;

export interface ListDirectoryOptions {
  compare?: EntryComparator;
}

export const directoriesFirstByName: EntryComparator = (left, right) => {
  if (left.type !== right.type) {
    return left.type === 'dir' ? -1 : 1;
  }
  const a = left.name.toLowerCase();
  const b = right.name.toLowerCase();
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

export function buildBreadcrumbs(relativePath: string): Breadcrumb[] {
  const parts = relativePath.split('/').filter((part) => part.length > 0 && part !== '.');
  return parts.map((name, idx) => ({
    name,
    path: parts.slice(0, idx + 1).join('/')
  }));
}

export async function listDirectory(
  resolver: PathResolver,
  dirPath: string,
  options: ListDirectoryOptions = {}
): Promise<DirectoryListing> {
  const names = await fs.promises.readdir(dirPath);
  const entries: DirectoryEntry[] = [];

  for (const name of names) {
    const absolutePath = path.join(dirPath, name);
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(absolutePath);
    } catch {
      // dangling symlinks and entries removed mid-listing are left out
      continue;
    }
    if (!stat.isDirectory() && !stat.isFile()) {
      continue;
    }
    entries.push({
      name,
      path: resolver.relativePath(absolutePath),
      type: stat.isDirectory() ? 'dir' : 'file',
      size: stat.isFile() ? stat.size : 0,
      modified: stat.mtime.toISOString()
    });
  }

  entries.sort(options.compare ?? directoriesFirstByName);

  const relativePath = resolver.relativePath(dirPath);
  const parent = dirPath === resolver.root ? null : resolver.relativePath(path.dirname(dirPath));
  return {
    path: relativePath,
    parent,
    breadcrumbs: buildBreadcrumbs(relativePath),
    entries
  };
}
