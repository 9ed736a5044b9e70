import { validators } from '../schemas/registry';
import type { FetchLike } from '../utils/api';
import { getConfig } from '../utils/config';
import { UpdateCheckError, describeError } from '../utils/errors';
import { compareSemver } from '../utils/semver';
import type { RailwayConfig } from './types';

export const GITHUB_API_RELEASE_URL = 'https://api.github.com/repos/railwayapp/cli/releases/latest';

export interface GithubRelease {
  tag_name: string;
}

/**
 * The slice of Configs the update check reads and stamps.
 */
export interface UpdateCheckHost {
  readonly rootConfig: RailwayConfig;
  readonly fetch: FetchLike;
  readonly version: string;
  isTerminal(): boolean;
  now(): Date;
  write(): void;
}

export function isSameUtcDay(a: Date, b: Date): boolean {
  return a.toISOString().slice(0, 10) === b.toISOString().slice(0, 10);
}

function checkedToday(host: UpdateCheckHost): boolean {
  const last = host.rootConfig.lastUpdateCheck;
  if (last === undefined) return false;
  const lastDate = new Date(last);
  return !Number.isNaN(lastDate.getTime()) && isSameUtcDay(lastDate, host.now());
}

/**
 * Return the latest published version when it is newer than the running one.
 *
 * Skipped (null, no request) on non-terminals and when a check already ran
 * today, unless `force` is set. The timestamp is persisted as soon as the
 * release endpoint answers, so a response that fails to parse still counts as
 * today's check.
 */
export async function checkUpdate(host: UpdateCheckHost, force: boolean): Promise<string | null> {
  // Banners would corrupt piped or machine-read output
  if (!force && !host.isTerminal()) return null;
  if (!force && checkedToday(host)) return null;

  if (getConfig().verbose) {
    process.stderr.write(`[GET] ${GITHUB_API_RELEASE_URL}\n`);
  }

  let res: Response;
  try {
    res = await host.fetch(GITHUB_API_RELEASE_URL, {
      headers: { 'User-Agent': 'railwayapp', Accept: 'application/vnd.github+json' },
    });
  } catch (err) {
    throw new UpdateCheckError(`Failed to fetch latest release: ${describeError(err)}`, err);
  }

  host.rootConfig.lastUpdateCheck = host.now().toISOString();
  host.write();

  if (!res.ok) {
    throw new UpdateCheckError(`Failed to fetch latest release: HTTP ${res.status}`);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new UpdateCheckError(`Invalid release metadata: ${describeError(err)}`, err);
  }

  const isRelease = validators['github-release']();
  if (!isRelease(body)) {
    throw new UpdateCheckError('Invalid release metadata: missing tag_name');
  }

  const latest = body.tag_name.replace(/^v/, '');
  return compareSemver(host.version, latest) < 0 ? latest : null;
}
