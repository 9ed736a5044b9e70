export type OutputFormat = 'json' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text'];

/**
 * Process-wide runtime settings shared by all command handlers.
 */
export interface Config {
  output: OutputFormat;
  verbose: boolean;
  quiet: boolean;
}

const DEFAULT_CONFIG: Config = {
  output: 'json',
  verbose: false,
  quiet: false,
};

let _config: Config = { ...DEFAULT_CONFIG };

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Merge global CLI option overrides into the current runtime config.
 */
export function setConfig(overrides: Partial<Config>): void {
  _config = { ..._config, ...overrides };
}

/**
 * Readonly view of the resolved runtime config for the current command invocation.
 */
export function getConfig(): Readonly<Config> {
  return _config;
}

export function resetConfig(): void {
  _config = { ...DEFAULT_CONFIG };
}
