import { Configs, type ConfigsOptions } from './configs';
import { addWarning } from './utils/warnings';

/**
 * Per-invocation state handed to every command. Configs is loaded on first
 * use so commands that never touch it (help, version) do not read the file.
 */
export interface CliContext {
  configs(): Configs;
}

export function createContext(options: ConfigsOptions = {}): CliContext {
  let configs: Configs | undefined;
  return {
    configs() {
      if (configs === undefined) {
        configs = Configs.load(options);
        if (configs.loadOutcome.kind === 'regenerated') {
          addWarning(`Unable to parse config file, regenerating (${configs.loadOutcome.reason})`);
        }
      }
      return configs;
    },
  };
}
