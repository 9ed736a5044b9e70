import type { Command } from 'commander';

/**
 * Detect Commander-thrown usage/control-flow errors so command handlers can rethrow
 * them instead of reporting them as command failures.
 */
export function isCommanderError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'CommanderError') return true;
  const code = 'code' in err ? err.code : undefined;
  return typeof code === 'string' && code.startsWith('commander.');
}

/**
 * Recursively route Commander output through our own error rendering and make
 * it throw instead of exiting, so callers decide the exit code.
 */
export function configureCommander(command: Command): void {
  command.configureOutput({
    writeOut: (str) => process.stdout.write(str),
    writeErr: () => {
      // Usage errors are rendered by the entry point
    },
  });
  command.exitOverride();
  for (const subcommand of command.commands) {
    configureCommander(subcommand);
  }
}
