import { randomBytes } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

/** Filesystem calls used by the atomic writer; tests substitute failing ones. */
export type AtomicFs = Pick<
  typeof fs,
  'mkdirSync' | 'openSync' | 'writeFileSync' | 'fsyncSync' | 'closeSync' | 'renameSync' | 'rmSync'
>;

function uniqueSuffix(): string {
  return `${process.pid}.${randomBytes(4).toString('hex')}`;
}

/**
 * Temporary sibling of `target`, unique per write:
 * `config-dev.json` → `config-dev.<pid>.<hex>.tmp`.
 */
export function tempPathFor(target: string, suffix: string = uniqueSuffix()): string {
  const ext = path.extname(target);
  return path.join(path.dirname(target), `${path.basename(target, ext)}.${suffix}.tmp`);
}

/**
 * Replace `target` with `contents` so readers only ever see the old or the new
 * file: write a temporary sibling, fsync it, then rename it over the target.
 * Concurrent writers never share a temporary file; the last rename wins.
 */
export function writeFileAtomic(target: string, contents: string, fsApi: AtomicFs = fs): void {
  fsApi.mkdirSync(path.dirname(target), { recursive: true });

  const tmpPath = tempPathFor(target);
  const fd = fsApi.openSync(tmpPath, 'wx');
  try {
    try {
      fsApi.writeFileSync(fd, contents, 'utf-8');
      fsApi.fsyncSync(fd);
    } finally {
      fsApi.closeSync(fd);
    }
    fsApi.renameSync(tmpPath, target);
  } catch (err) {
    fsApi.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export type ReadResult =
  | { kind: 'found'; contents: string }
  | { kind: 'missing' }
  | { kind: 'unreadable'; reason: string };

export function readConfigFile(target: string): ReadResult {
  try {
    return { kind: 'found', contents: fs.readFileSync(target, 'utf-8') };
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') return { kind: 'missing' };
    return { kind: 'unreadable', reason: err instanceof Error ? err.message : String(err) };
  }
}
