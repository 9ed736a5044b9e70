/**
 * One binding between a local directory and a remote project. Only the ids
 * take part in resolution; `name` and `environmentName` are display caches.
 */
export interface LinkedProject {
  projectPath: string;
  name?: string;
  project: string;
  environment: string;
  environmentName?: string;
  service?: string;
}

export interface RailwayUser {
  token?: string;
}

/** Root persisted document, keyed by absolute directory path. */
export interface RailwayConfig {
  projects: Record<string, LinkedProject>;
  user: RailwayUser;
  /** ISO-8601 timestamp of the last update-check request. */
  lastUpdateCheck?: string;
  newVersionAvailable?: string;
}

// On-disk shapes. Files written by older clients carry explicit nulls.

export interface LinkedProjectDocument {
  projectPath: string;
  name?: string | null;
  project: string;
  environment: string;
  environmentName?: string | null;
  service?: string | null;
}

export interface RailwayConfigDocument {
  projects: Record<string, LinkedProjectDocument>;
  user: { token?: string | null };
  lastUpdateCheck?: string | null;
  newVersionAvailable?: string | null;
}

export type LoadOutcome =
  | { kind: 'loaded' }
  | { kind: 'missing' }
  | { kind: 'regenerated'; reason: string };

export function emptyConfig(): RailwayConfig {
  return { projects: {}, user: {} };
}
