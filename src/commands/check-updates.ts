import { Command } from 'commander';
import type { CliContext } from '../context';
import { print, reportFailure, success } from '../utils/output';

export function checkUpdatesCommand(ctx: CliContext): Command {
  return new Command('check-updates')
    .description(
      'Check whether a newer CLI release is available.\n\n' +
        'Checks run at most once per day and only on a terminal; --force skips both\n' +
        'limits.'
    )
    .option('-f, --force', 'check even if already checked today or not on a terminal')
    .action(async (options: { force?: boolean }, cmd: Command) => {
      try {
        const configs = ctx.configs();
        const latest = await configs.checkUpdate(options.force ?? false);
        print(
          success({
            currentVersion: configs.version,
            latestVersion: latest,
            updateAvailable: latest !== null,
          })
        );
      } catch (err) {
        reportFailure(cmd, err, 'UPDATE_CHECK_FAILED');
      }
    });
}
