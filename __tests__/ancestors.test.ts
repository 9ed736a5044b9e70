import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { ancestorsOf, findClosest } from '../src/configs';

describe('ancestorsOf', () => {
  test('walks a posix path up to the root, closest first', () => {
    expect(ancestorsOf('/a/b/c', path.posix)).toEqual(['/a/b/c', '/a/b', '/a', '/']);
  });

  test('the root is its own single ancestor', () => {
    expect(ancestorsOf('/', path.posix)).toEqual(['/']);
  });

  test('normalizes trailing separators and dot segments', () => {
    expect(ancestorsOf('/a/./b/../c/', path.posix)).toEqual(['/a/c', '/a', '/']);
  });

  test('stops at a Windows drive root', () => {
    expect(ancestorsOf('C:\\repo\\app', path.win32)).toEqual(['C:\\repo\\app', 'C:\\repo', 'C:\\']);
  });

  test('stops at a UNC share root', () => {
    expect(ancestorsOf('\\\\server\\share\\repo', path.win32)).toEqual([
      '\\\\server\\share\\repo',
      '\\\\server\\share\\',
    ]);
  });
});

describe('findClosest', () => {
  const linked = new Set(['/a', '/a/b']);

  test('returns the nearest linked ancestor', () => {
    expect(findClosest('/a/b/c/d', (p) => linked.has(p), path.posix)).toBe('/a/b');
    expect(findClosest('/a/x', (p) => linked.has(p), path.posix)).toBe('/a');
  });

  test('returns undefined when nothing in the chain is linked', () => {
    expect(findClosest('/x/y', (p) => linked.has(p), path.posix)).toBeUndefined();
  });

  test('a linked root matches every directory', () => {
    expect(findClosest('/x/y', (p) => p === '/', path.posix)).toBe('/');
  });
});
