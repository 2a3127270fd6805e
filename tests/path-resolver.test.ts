import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotADirectoryError, TraversalError } from '../src/errors.js';
import { PathResolver, isWithinRoot, resolveWithinRoot } from '../src/path-resolver.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('isWithinRoot', () => {
  it('accepts the root itself and its descendants', () => {
    expect(isWithinRoot('/srv/files', '/srv/files')).toBe(true);
    expect(isWithinRoot('/srv/files', '/srv/files/docs/a.txt')).toBe(true);
  });

  it('rejects a sibling that shares the root as a string prefix', () => {
    expect(isWithinRoot('/srv/files', '/srv/files-evil')).toBe(false);
    expect(isWithinRoot('/srv/files', '/srv/files-evil/a.txt')).toBe(false);
  });

  it('rejects parents of the root', () => {
    expect(isWithinRoot('/srv/files', '/srv')).toBe(false);
    expect(isWithinRoot('/srv/files', '/')).toBe(false);
  });

  it('accepts names that merely start with two dots', () => {
    expect(isWithinRoot('/srv/files', '/srv/files/..hidden')).toBe(true);
  });
});

describe('PathResolver', () => {
  let base: string;
  let root: string;
  let resolver: PathResolver;

  beforeEach(async () => {
    base = await makeTempDir('resolver');
    root = path.join(base, 'files');
    await fs.promises.mkdir(path.join(root, 'docs'), { recursive: true });
    await fs.promises.writeFile(path.join(root, 'docs', 'a.txt'), 'a');
    await fs.promises.mkdir(path.join(base, 'files-evil'));
    await fs.promises.writeFile(path.join(base, 'secret.txt'), 'secret');
    resolver = await PathResolver.create(root);
  });

  afterEach(async () => {
    await removeDir(base);
  });

  it('resolves the empty path to the root', async () => {
    await expect(resolver.resolve('')).resolves.toBe(root);
    await expect(resolver.resolve(undefined)).resolves.toBe(root);
  });

  it('resolves nested relative paths', async () => {
    await expect(resolver.resolve('docs/a.txt')).resolves.toBe(path.join(root, 'docs', 'a.txt'));
    await expect(resolver.resolve('docs/./a.txt')).resolves.toBe(path.join(root, 'docs', 'a.txt'));
  });

  it('treats leading separators as relative to the root', async () => {
    await expect(resolver.resolve('/docs/a.txt')).resolves.toBe(path.join(root, 'docs', 'a.txt'));
    await expect(resolver.resolve('//etc/passwd')).resolves.toBe(path.join(root, 'etc', 'passwd'));
  });

  it('does not require the target to exist', async () => {
    await expect(resolver.resolve('missing/deep/file.txt')).resolves.toBe(
      path.join(root, 'missing', 'deep', 'file.txt')
    );
  });

  it('allows .. segments that stay inside the root', async () => {
    await expect(resolver.resolve('docs/../docs/a.txt')).resolves.toBe(path.join(root, 'docs', 'a.txt'));
  });

  it.each(['..', '../secret.txt', 'docs/../../secret.txt', '../../../../etc/passwd', '../files-evil'])(
    'rejects %s',
    async (requested) => {
      await expect(resolver.resolve(requested)).rejects.toBeInstanceOf(TraversalError);
    }
  );

  it('rejects NUL bytes', async () => {
    await expect(resolver.resolve('docs/a.txt\0.png')).rejects.toBeInstanceOf(TraversalError);
  });

  it('rejects symlinks that point outside the root', async () => {
    await fs.promises.symlink(base, path.join(root, 'escape'));
    await expect(resolver.resolve('escape/secret.txt')).rejects.toBeInstanceOf(TraversalError);
    await expect(resolver.resolve('escape')).rejects.toBeInstanceOf(TraversalError);
  });

  it('rejects a symlink into a sibling sharing the root prefix', async () => {
    await fs.promises.symlink(path.join(base, 'files-evil'), path.join(root, 'sneaky'));
    await expect(resolver.resolve('sneaky')).rejects.toBeInstanceOf(TraversalError);
    await expect(resolver.resolve('sneaky/new.txt')).rejects.toBeInstanceOf(TraversalError);
  });

  it('follows symlinks that stay inside the root', async () => {
    await fs.promises.symlink(path.join(root, 'docs'), path.join(root, 'docs-link'));
    await expect(resolver.resolve('docs-link/a.txt')).resolves.toBe(path.join(root, 'docs', 'a.txt'));
  });

  it('is idempotent on the relative form of a resolved path', async () => {
    const resolved = await resolver.resolve('docs/./../docs/a.txt');
    expect(resolver.relativePath(resolved)).toBe('docs/a.txt');
    await expect(resolver.resolve(resolver.relativePath(resolved))).resolves.toBe(resolved);
  });

  it('canonicalizes the root when it is reached through a symlink', async () => {
    const link = path.join(base, 'root-link');
    await fs.promises.symlink(root, link);
    const viaLink = await PathResolver.create(link);
    expect(viaLink.root).toBe(root);
  });

  it('refuses to serve a file as the root', async () => {
    await expect(PathResolver.create(path.join(root, 'docs', 'a.txt'))).rejects.toBeInstanceOf(NotADirectoryError);
  });

  it('exposes the same containment rule as a plain function', async () => {
    await expect(resolveWithinRoot(root, 'docs')).resolves.toBe(path.join(root, 'docs'));
    await expect(resolveWithinRoot(root, '../files-evil')).rejects.toBeInstanceOf(TraversalError);
  });
});
