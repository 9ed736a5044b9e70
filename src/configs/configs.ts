import os from 'node:os';
import path from 'node:path';
import { validators } from '../schemas/registry';
import { createAuthorizedClient, postGraphql, type CredentialSource, type FetchLike } from '../utils/api';
import {
  ConfigWriteError,
  HomeDirectoryError,
  NoLinkedProjectError,
  ProjectNotFoundError,
} from '../utils/errors';
import { VERSION } from '../version';
import { findClosest, type PathApi } from './ancestors';
import { parseConfig, serializeConfig } from './document';
import {
  CONFIG_DIR_NAME,
  ENV_VARS,
  backboardUrl,
  configFileName,
  hostFor,
  isCi,
  readToken,
  relayHostPath,
  resolveEnvironment,
  type EnvSnapshot,
  type Environment,
} from './environment';
import { PROJECT_TOKEN_QUERY } from './queries';
import { readConfigFile, writeFileAtomic, type AtomicFs } from './store';
import { emptyConfig, type LinkedProject, type LoadOutcome, type RailwayConfig } from './types';
import { checkUpdate } from './update-check';

/**
 * Process-level inputs of Configs. Every field defaults to the real process.
 */
export interface ConfigsOptions {
  env?: EnvSnapshot;
  homeDir?: () => string;
  cwd?: () => string;
  fetch?: FetchLike;
  isTerminal?: () => boolean;
  now?: () => Date;
  version?: string;
  pathApi?: PathApi;
  fs?: AtomicFs;
}

function resolveHomeDir(homeDir: () => string): string {
  let home: string;
  try {
    home = homeDir();
  } catch (err) {
    throw new HomeDirectoryError(err);
  }
  if (home.trim().length === 0) throw new HomeDirectoryError();
  return home;
}

/**
 * Local CLI state: the persisted document at `~/.railway/config*.json` plus the
 * resolution rules for environment, credentials and the linked project.
 * Mutations stay in memory until `write()`.
 */
export class Configs implements CredentialSource {
  readonly env: EnvSnapshot;
  readonly environment: Environment;
  readonly rootConfigPath: string;
  readonly loadOutcome: LoadOutcome;
  readonly fetch: FetchLike;
  readonly version: string;
  rootConfig: RailwayConfig;

  private readonly cwd: () => string;
  private readonly terminal: () => boolean;
  private readonly clock: () => Date;
  private readonly pathApi: PathApi | undefined;
  private readonly fsApi: AtomicFs | undefined;

  private constructor(
    options: ConfigsOptions,
    rootConfigPath: string,
    rootConfig: RailwayConfig,
    loadOutcome: LoadOutcome
  ) {
    this.env = options.env ?? process.env;
    this.environment = resolveEnvironment(this.env);
    this.rootConfigPath = rootConfigPath;
    this.rootConfig = rootConfig;
    this.loadOutcome = loadOutcome;
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.version = options.version ?? VERSION;
    this.cwd = options.cwd ?? (() => process.cwd());
    this.terminal = options.isTerminal ?? (() => process.stdout.isTTY === true);
    this.clock = options.now ?? (() => new Date());
    this.pathApi = options.pathApi;
    this.fsApi = options.fs;
  }

  /**
   * Read the config file for the selected environment. A missing file yields an
   * empty document; an unreadable or invalid one is replaced in memory by an
   * empty document and reported through `loadOutcome`.
   */
  static load(options: ConfigsOptions = {}): Configs {
    const env = options.env ?? process.env;
    const home = resolveHomeDir(options.homeDir ?? os.homedir);
    const rootConfigPath = path.join(home, CONFIG_DIR_NAME, configFileName(resolveEnvironment(env)));

    const file = readConfigFile(rootConfigPath);
    if (file.kind === 'missing') {
      return new Configs(options, rootConfigPath, emptyConfig(), { kind: 'missing' });
    }
    if (file.kind === 'unreadable') {
      return new Configs(options, rootConfigPath, emptyConfig(), { kind: 'regenerated', reason: file.reason });
    }

    const parsed = parseConfig(file.contents);
    if (!parsed.ok) {
      return new Configs(options, rootConfigPath, emptyConfig(), { kind: 'regenerated', reason: parsed.reason });
    }
    return new Configs(options, rootConfigPath, parsed.config, { kind: 'loaded' });
  }

  reset(): void {
    this.rootConfig = emptyConfig();
  }

  // ── Credentials ────────────────────────────────────────────────────────────

  /** Project-scoped token; its presence bypasses directory linking. */
  getRailwayToken(): string | undefined {
    return readToken(this.env, ENV_VARS.projectToken);
  }

  getRailwayApiToken(): string | undefined {
    return readToken(this.env, ENV_VARS.apiToken);
  }

  /**
   * `RAILWAY_API_TOKEN` first, then the stored user token. Blank values are
   * treated as absent.
   */
  getRailwayAuthToken(): string | undefined {
    const apiToken = this.getRailwayApiToken();
    if (apiToken !== undefined) return apiToken;
    const stored = this.rootConfig.user.token;
    return stored !== undefined && stored.trim().length > 0 ? stored : undefined;
  }

  setUserToken(token: string | undefined): void {
    if (token === undefined) {
      delete this.rootConfig.user.token;
    } else {
      this.rootConfig.user.token = token;
    }
  }

  envIsCi(): boolean {
    return isCi(this.env);
  }

  // ── Hosts ──────────────────────────────────────────────────────────────────

  getHost(): string {
    return hostFor(this.environment);
  }

  getRelayHostPath(): string {
    return relayHostPath(this.environment);
  }

  getBackboard(): string {
    return backboardUrl(this.environment);
  }

  // ── Linked project resolution ──────────────────────────────────────────────

  getCurrentDirectory(): string {
    return (this.pathApi ?? path).resolve(this.cwd());
  }

  /**
   * Nearest directory, from the current one up to the root, that has a linked
   * project. With a project token the current directory stands in.
   */
  getClosestLinkedProjectDirectory(): string {
    const current = this.getCurrentDirectory();
    if (this.getRailwayToken() !== undefined) return current;

    const { projects } = this.rootConfig;
    const closest = findClosest(current, (candidate) => Object.hasOwn(projects, candidate), this.pathApi);
    if (closest === undefined) throw new NoLinkedProjectError();
    return closest;
  }

  async getLinkedProject(): Promise<LinkedProject> {
    if (this.getRailwayToken() !== undefined) {
      return this.getTokenLinkedProject();
    }

    const linked = this.rootConfig.projects[this.getClosestLinkedProjectDirectory()];
    if (linked === undefined) throw new NoLinkedProjectError();
    return { ...linked };
  }

  private async getTokenLinkedProject(): Promise<LinkedProject> {
    const client = createAuthorizedClient(this);
    const data = await postGraphql(client, PROJECT_TOKEN_QUERY, {}, validators['project-token']());

    const projectPath = this.getCurrentDirectory();
    const stored = this.rootConfig.projects[projectPath];
    const linked: LinkedProject = {
      projectPath,
      name: data.projectToken.project.name,
      project: data.projectToken.project.id,
      environment: data.projectToken.environment.id,
      environmentName: data.projectToken.environment.name,
    };
    if (stored?.service !== undefined) linked.service = stored.service;
    return linked;
  }

  /**
   * The stored entry itself, for in-place edits. Identity from a project token
   * has no stored entry, so this always fails while one is set.
   */
  getLinkedProjectMut(): LinkedProject {
    if (this.getRailwayToken() !== undefined) {
      throw new ProjectNotFoundError('Linked project settings cannot be changed while RAILWAY_TOKEN is set');
    }
    const linked = this.rootConfig.projects[this.getClosestLinkedProjectDirectory()];
    if (linked === undefined) throw new ProjectNotFoundError();
    return linked;
  }

  // ── Mutations ──────────────────────────────────────────────────────────────

  /** Link the current directory itself, replacing any previous entry. */
  linkProject(
    projectId: string,
    name: string | undefined,
    environmentId: string,
    environmentName: string | undefined
  ): LinkedProject {
    const projectPath = this.getCurrentDirectory();
    const linked: LinkedProject = { projectPath, project: projectId, environment: environmentId };
    if (name !== undefined) linked.name = name;
    if (environmentName !== undefined) linked.environmentName = environmentName;
    this.rootConfig.projects[projectPath] = linked;
    return linked;
  }

  linkService(serviceId: string): LinkedProject {
    const linked = this.getLinkedProjectMut();
    linked.service = serviceId;
    return linked;
  }

  unlinkService(): LinkedProject {
    const linked = this.getLinkedProjectMut();
    delete linked.service;
    return linked;
  }

  /** Remove the closest linked project; nothing linked is not an error. */
  unlinkProject(): LinkedProject | undefined {
    let projectPath: string;
    try {
      projectPath = this.getClosestLinkedProjectDirectory();
    } catch (err) {
      if (err instanceof NoLinkedProjectError) return undefined;
      throw err;
    }
    const removed = this.rootConfig.projects[projectPath];
    delete this.rootConfig.projects[projectPath];
    return removed;
  }

  // ── Persistence ────────────────────────────────────────────────────────────

  write(): void {
    try {
      writeFileAtomic(this.rootConfigPath, serializeConfig(this.rootConfig), this.fsApi);
    } catch (err) {
      throw new ConfigWriteError(this.rootConfigPath, err);
    }
  }

  // ── Update check ───────────────────────────────────────────────────────────

  isTerminal(): boolean {
    return this.terminal();
  }

  now(): Date {
    return this.clock();
  }

  checkUpdate(force: boolean): Promise<string | null> {
    return checkUpdate(this, force);
  }
}
