#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createContext } from './context';
import { createProgram } from './index';
import { configureCommander } from './utils/commander';
import { setConfig, type OutputFormat } from './utils/config';
import { describeError } from './utils/errors';
import { failure, print } from './utils/output';
import { resetWarnings } from './utils/warnings';

// Parse the requested output mode before Commander initialization so usage errors
// can be emitted in the same format the user asked for.
function detectRequestedOutput(argv: string[]): OutputFormat {
  for (let i = 2; i < argv.length; i++) {
    const token = argv[i];
    if (token === '--output') return argv[i + 1] === 'text' ? 'text' : 'json';
    if (token.startsWith('--output=')) return token.slice('--output='.length) === 'text' ? 'text' : 'json';
  }
  return 'json';
}

function normalizeCommanderMessage(message: string): string {
  return message.replace(/^error:\s*/i, '').trim();
}

/**
 * CLI entrypoint: parse args, run the command and normalize usage errors.
 */
async function main(): Promise<void> {
  resetWarnings();
  const output = detectRequestedOutput(process.argv);
  setConfig({ output });

  const program = createProgram(createContext());
  configureCommander(program);

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    // Help and version displays are not errors
    if (
      err.code === 'commander.helpDisplayed' ||
      err.code === 'commander.help' ||
      err.code === 'commander.version'
    ) {
      process.exit(0);
    }

    const message = normalizeCommanderMessage(err.message);
    if (message.length > 0) {
      if (output === 'text') {
        process.stderr.write(`${message}\n`);
      } else {
        print(failure('CLI_USAGE_ERROR', message, { commanderCode: err.code }));
      }
    }
    process.exit(err.exitCode || 1);
  }
}

main().catch((err: unknown) => {
  print(failure('CLI_FATAL', describeError(err)));
  process.exit(1);
});
