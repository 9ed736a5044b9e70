import { summarizeErrors, validate, validators } from '../schemas/registry';
import type {
  LinkedProject,
  LinkedProjectDocument,
  RailwayConfig,
  RailwayConfigDocument,
} from './types';

export type ParseResult =
  | { ok: true; config: RailwayConfig }
  | { ok: false; reason: string };

function optional(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

function normalizeProject(doc: LinkedProjectDocument): LinkedProject {
  const project: LinkedProject = {
    projectPath: doc.projectPath,
    project: doc.project,
    environment: doc.environment,
  };
  const name = optional(doc.name);
  const environmentName = optional(doc.environmentName);
  const service = optional(doc.service);
  if (name !== undefined) project.name = name;
  if (environmentName !== undefined) project.environmentName = environmentName;
  if (service !== undefined) project.service = service;
  return project;
}

function normalize(doc: RailwayConfigDocument): RailwayConfig {
  const projects: Record<string, LinkedProject> = {};
  for (const [path, project] of Object.entries(doc.projects)) {
    projects[path] = normalizeProject(project);
  }
  const config: RailwayConfig = { projects, user: {} };
  const token = optional(doc.user.token);
  const lastUpdateCheck = optional(doc.lastUpdateCheck);
  const newVersionAvailable = optional(doc.newVersionAvailable);
  if (token !== undefined) config.user.token = token;
  if (lastUpdateCheck !== undefined) config.lastUpdateCheck = lastUpdateCheck;
  if (newVersionAvailable !== undefined) config.newVersionAvailable = newVersionAvailable;
  return config;
}

/**
 * Parse the raw bytes of a config file. Explicit nulls become absent fields.
 */
export function parseConfig(raw: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  const isDocument = validators.config();
  if (!isDocument(data)) {
    return { ok: false, reason: summarizeErrors(validate('config', data)) };
  }
  return { ok: true, config: normalize(data) };
}

/**
 * Pretty-printed JSON with projects ordered by path.
 */
export function serializeConfig(config: RailwayConfig): string {
  const projects: Record<string, LinkedProject> = {};
  for (const path of Object.keys(config.projects).sort()) {
    projects[path] = config.projects[path];
  }
  return JSON.stringify({ ...config, projects }, null, 2);
}
