/**
 * Deployment channel selection. Every helper here is a pure function of an
 * environment-variable snapshot, so callers pass `process.env` (or a test
 * fixture) explicitly.
 */

export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

export type Environment = 'production' | 'staging' | 'dev';

export const ENV_VARS = {
  apiToken: 'RAILWAY_API_TOKEN',
  projectToken: 'RAILWAY_TOKEN',
  environment: 'RAILWAY_ENV',
  ci: 'CI',
} as const;

const HOSTS: Record<Environment, string> = {
  production: 'railway.com',
  staging: 'railway-staging.com',
  dev: 'railway-develop.com',
};

const CONFIG_FILE_NAMES: Record<Environment, string> = {
  production: 'config.json',
  staging: 'config-staging.json',
  dev: 'config-dev.json',
};

export const CONFIG_DIR_NAME = '.railway';

export function resolveEnvironment(env: EnvSnapshot): Environment {
  switch (env[ENV_VARS.environment]?.toLowerCase()) {
    case 'staging':
      return 'staging';
    case 'dev':
    case 'develop':
      return 'dev';
    default:
      return 'production';
  }
}

export function hostFor(environment: Environment): string {
  return HOSTS[environment];
}

export function configFileName(environment: Environment): string {
  return CONFIG_FILE_NAMES[environment];
}

export function backboardUrl(environment: Environment): string {
  return `https://backboard.${hostFor(environment)}/graphql/v2`;
}

/** Relay endpoint without protocol, usable with both https:// and wss://. */
export function relayHostPath(environment: Environment): string {
  return `backboard.${hostFor(environment)}/relay`;
}

export function isCi(env: EnvSnapshot): boolean {
  return env[ENV_VARS.ci]?.trim().toLowerCase() === 'true';
}

/**
 * Read a credential variable; blank values count as unset.
 */
export function readToken(env: EnvSnapshot, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}
