import { Command } from 'commander';
import { checkUpdatesCommand } from './commands/check-updates';
import { configCommand } from './commands/config/index';
import { linkCommand } from './commands/link';
import { logoutCommand } from './commands/logout';
import { serviceCommand } from './commands/service/index';
import { statusCommand } from './commands/status';
import { unlinkCommand } from './commands/unlink';
import type { CliContext } from './context';
import { getConfig, isOutputFormat, setConfig } from './utils/config';
import { describeError } from './utils/errors';
import { VERSION } from './version';

/**
 * Print a banner on stderr when a newer release exists. Runs after each
 * command; CI runs and non-terminals are skipped.
 */
async function notifyUpdate(ctx: CliContext): Promise<void> {
  const configs = ctx.configs();
  if (configs.envIsCi()) return;
  try {
    const latest = await configs.checkUpdate(false);
    if (latest !== null) {
      process.stderr.write(
        `New version available: v${latest} (current v${configs.version}). Run \`railway upgrade\` to update.\n`
      );
    }
  } catch (err) {
    process.stderr.write(`Update check failed: ${describeError(err)}\n`);
    if (getConfig().verbose && err instanceof Error && err.stack) {
      process.stderr.write(`${err.stack}\n`);
    }
  }
}

/**
 * Build the root Commander program with global options and all subcommands.
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('railway')
    .description(
      'Railway CLI: link local directories to projects and manage local credentials.\n\n' +
        'TYPICAL WORKFLOW:\n' +
        '  railway link -p <project> -e <environment>   # 1. link the repository root\n' +
        '  railway service link <service>               # 2. pick the service\n' +
        '  railway status                               # 3. works from any subdirectory\n\n' +
        'OUTPUT: --output supports json and text. Exit code 1 on error.\n' +
        'ENV: RAILWAY_ENV selects production, staging or dev (separate config files).\n' +
        '     RAILWAY_API_TOKEN overrides the stored login; RAILWAY_TOKEN scopes\n' +
        '     commands to one project and bypasses directory links.'
    )
    .version(VERSION)
    .option('--output <format>', 'output format: json or text', 'json')
    .option('-q, --quiet', 'print only the result data')
    .option('-v, --verbose', 'log HTTP requests to stderr')
    .hook('preAction', (_thisCommand: Command, actionCommand: Command) => {
      const opts = actionCommand.optsWithGlobals<{
        output: string;
        quiet?: boolean;
        verbose?: boolean;
      }>();
      if (!isOutputFormat(opts.output)) {
        actionCommand.error(`Unknown output format '${opts.output}'. Valid formats: json, text`);
      }
      setConfig({
        output: opts.output,
        quiet: opts.quiet ?? false,
        verbose: opts.verbose ?? false,
      });
    })
    .hook('postAction', async (_thisCommand: Command, actionCommand: Command) => {
      if (actionCommand.name() === 'check-updates') return;
      await notifyUpdate(ctx);
    });

  // Show help when no subcommand given; error on unknown commands
  program.action(function (this: Command) {
    if (this.args.length > 0) {
      this.error(`unknown command '${this.args[0]}'`);
    }
    program.help();
  });

  program
    .addCommand(linkCommand(ctx))
    .addCommand(unlinkCommand(ctx))
    .addCommand(serviceCommand(ctx))
    .addCommand(statusCommand(ctx))
    .addCommand(logoutCommand(ctx))
    .addCommand(checkUpdatesCommand(ctx))
    .addCommand(configCommand(ctx));

  return program;
}
