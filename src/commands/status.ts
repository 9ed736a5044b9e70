import { Command } from 'commander';
import type { CliContext } from '../context';
import { print, reportFailure, success } from '../utils/output';

/**
 * Show which project, environment and service apply to the current directory.
 */
export function statusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description(
      'Show the project linked to the current directory.\n\n' +
        'The closest linked parent directory applies. When RAILWAY_TOKEN is set the\n' +
        'project and environment come from the token instead.'
    )
    .action(async (_options: unknown, cmd: Command) => {
      try {
        const configs = ctx.configs();
        const linked = await configs.getLinkedProject();
        print(
          success({
            ...linked,
            source: configs.getRailwayToken() !== undefined ? 'token' : 'directory',
            backboard: configs.getBackboard(),
          })
        );
      } catch (err) {
        reportFailure(cmd, err, 'STATUS_FAILED');
      }
    });
}
