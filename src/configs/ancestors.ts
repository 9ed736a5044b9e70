import path, { type PlatformPath } from 'node:path';

export type PathApi = Pick<PlatformPath, 'resolve' | 'dirname'>;

/**
 * Ordered chain of directories from `directory` up to its filesystem root,
 * closest first. The walk stops when `dirname` no longer moves, which covers
 * `/`, drive roots such as `C:\` and UNC share roots.
 */
export function ancestorsOf(directory: string, pathApi: PathApi = path): string[] {
  const chain: string[] = [];
  let current = pathApi.resolve(directory);
  for (;;) {
    chain.push(current);
    const parent = pathApi.dirname(current);
    if (parent === current) return chain;
    current = parent;
  }
}

/**
 * First entry of the ancestor chain that `isLinked` accepts.
 */
export function findClosest(
  directory: string,
  isLinked: (candidate: string) => boolean,
  pathApi: PathApi = path
): string | undefined {
  return ancestorsOf(directory, pathApi).find(isLinked);
}
