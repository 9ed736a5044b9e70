export { Configs, type ConfigsOptions } from './configs';
export { ancestorsOf, findClosest, type PathApi } from './ancestors';
export { parseConfig, serializeConfig, type ParseResult } from './document';
export {
  ENV_VARS,
  backboardUrl,
  configFileName,
  hostFor,
  isCi,
  relayHostPath,
  resolveEnvironment,
  type EnvSnapshot,
  type Environment,
} from './environment';
export { tempPathFor, writeFileAtomic, type AtomicFs } from './store';
export { GITHUB_API_RELEASE_URL, isSameUtcDay } from './update-check';
export type { LinkedProject, LoadOutcome, RailwayConfig, RailwayUser } from './types';
