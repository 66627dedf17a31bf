import { afterEach, describe, expect, it } from 'vitest';
import { join } from 'node:path';
import { isContained, isWithinRoot, type AllowedRoot } from '@/security/containment.js';
import { resolvePath, type ResolvedPath } from '@/security/path-resolver.js';
import { ACCESS_DENIED_MESSAGE } from '@/types/index.js';
import { createTempDir, expectFailure, expectOk, makeDir, removeTempDirs } from '../../helpers/fixture.js';

function resolved(dir: string): ResolvedPath {
  return expectOk(resolvePath(dir));
}

function roots(...dirs: string[]): AllowedRoot[] {
  return dirs.map((dir, index) => ({ configured: dir, path: resolved(dir), index }));
}

afterEach(() => {
  removeTempDirs();
});

describe('isContained', () => {
  it('accepts the root itself', () => {
    const data = createTempDir();

    expect(expectOk(isContained(resolved(data), roots(data))).configured).toBe(data);
  });

  it('accepts proper descendants and attributes them to their root', () => {
    const a = createTempDir();
    const b = createTempDir();
    const docs = makeDir(b, 'docs/readme');
    const x = makeDir(a, 'x');
    const allowed = roots(a, b);

    expect(expectOk(isContained(resolved(docs), allowed)).index).toBe(1);
    expect(expectOk(isContained(resolved(x), allowed)).index).toBe(0);
  });

  it.each([
    ['user2', 'user'],
    ['bc', 'b'],
    ['b.bak/file', 'b'],
  ])('rejects %s against root %s despite the shared string prefix', (candidate, root) => {
    const base = createTempDir();
    const candidateDir = makeDir(base, candidate);
    const rootDir = makeDir(base, root);

    expect(expectFailure(isContained(resolved(candidateDir), roots(rootDir)))).toEqual({
      errorKind: 'NotAllowed',
      message: ACCESS_DENIED_MESSAGE,
    });
  });

  it('rejects the parent of a root', () => {
    const data = createTempDir();
    const publicDir = makeDir(data, 'public');

    expect(expectFailure(isContained(resolved(data), roots(publicDir))).errorKind).toBe('NotAllowed');
  });

  it('rejects everything when no roots are configured', () => {
    expect(expectFailure(isContained(resolved(createTempDir()), [])).errorKind).toBe('NotAllowed');
  });

  it('prefers the most specific of nested roots', () => {
    const data = createTempDir();
    const site = makeDir(data, 'projects/site');
    const page = makeDir(site, 'pages');
    const allowed = roots(data, site, join(data, 'projects'));

    expect(expectOk(isContained(resolved(page), allowed)).configured).toBe(site);
  });

  it('breaks exact ties by configured order', () => {
    const data = createTempDir();
    const x = makeDir(data, 'x');
    const allowed: AllowedRoot[] = [
      { configured: 'first', path: resolved(data), index: 0 },
      { configured: 'second', path: resolved(data), index: 1 },
    ];

    expect(expectOk(isContained(resolved(x), allowed)).configured).toBe('first');
  });
});

describe('isWithinRoot', () => {
  it('handles the filesystem root, which already ends with a separator', () => {
    const dir = createTempDir();

    expect(isWithinRoot(resolved(dir), resolved('/'))).toBe(true);
    expect(isWithinRoot(resolved('/'), resolved(dir))).toBe(false);
  });
});
