import type { Command } from 'commander';
import { isCommanderError } from './commander';
import { getConfig } from './config';
import { ApiError, CliError, describeError } from './errors';
import { consumeWarnings } from './warnings';

export interface CLIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  warnings?: string[];
  metadata?: {
    timestamp: string;
  };
}

export function success<T>(data: T): CLIResponse<T> {
  return {
    success: true,
    data,
    metadata: { timestamp: new Date().toISOString() },
  };
}

export function failure(code: string, message: string, details?: unknown): CLIResponse {
  return {
    success: false,
    error: { code, message, ...(details !== undefined ? { details } : {}) },
    metadata: { timestamp: new Date().toISOString() },
  };
}

/**
 * Render a response in the configured output format. Failures go to stderr in
 * text mode; warnings were already echoed to stderr when they were raised.
 */
export function print(response: CLIResponse): void {
  const config = getConfig();
  const warnings = consumeWarnings();

  if (config.output === 'text') {
    if (response.success) {
      const text = formatText(response.data);
      if (text.length > 0) console.log(text);
      return;
    }
    const code = response.error?.code ?? 'UNKNOWN';
    const message = response.error?.message ?? 'Unknown error';
    console.error(`Error [${code}]: ${message}`);
    const details = formatText(response.error?.details, '  ');
    if (details.length > 0) console.error(details);
    return;
  }

  if (response.success && config.quiet) {
    if (response.data !== undefined) console.log(JSON.stringify(response.data, null, 2));
    return;
  }

  const envelope = warnings.length > 0 ? { ...response, warnings } : response;
  console.log(JSON.stringify(envelope, null, 2));
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatText(data: unknown, indent = ''): string {
  if (data === undefined || data === null) return '';
  if (Array.isArray(data)) {
    if (data.length === 0) return `${indent}(empty)`;
    return data
      .map((item) =>
        isObjectRecord(item) ? `${indent}-\n${formatText(item, indent + '  ')}` : `${indent}- ${String(item)}`
      )
      .join('\n');
  }
  if (!isObjectRecord(data)) return `${indent}${String(data)}`;
  return Object.entries(data)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => {
      if (value === null) return `${indent}${key}: (none)`;
      if (typeof value !== 'object') return `${indent}${key}: ${String(value)}`;
      return `${indent}${key}:\n${formatText(value, indent + '  ')}`;
    })
    .join('\n');
}

const HINTS: Partial<Record<string, string>> = {
  NO_LINKED_PROJECT: 'Run `railway link --project <id> --environment <id>` in your project directory',
  PROJECT_NOT_FOUND: 'Run `railway link` first, or unset RAILWAY_TOKEN to use directory links',
  UNAUTHORIZED: 'Set RAILWAY_API_TOKEN or log in again',
};

/**
 * Print a failure envelope for `err` and exit the command with code 1.
 * Commander control-flow errors pass through untouched.
 */
export function reportFailure(cmd: Command, err: unknown, fallbackCode: string): never {
  if (isCommanderError(err)) throw err;
  if (err instanceof CliError || err instanceof ApiError) {
    const hint = HINTS[err.code];
    print(failure(err.code, err.message, hint !== undefined ? { hint } : undefined));
  } else {
    print(failure(fallbackCode, describeError(err)));
  }
  return cmd.error('', { exitCode: 1 });
}
