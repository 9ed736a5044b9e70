import { Command } from 'commander';
import type { CliContext } from '../context';
import { print, reportFailure, success } from '../utils/output';

export function unlinkCommand(ctx: CliContext): Command {
  return new Command('unlink')
    .description(
      'Remove the link of the closest linked directory (this one or a parent).\n\n' +
        'Does nothing when no directory is linked.'
    )
    .action((_options: unknown, cmd: Command) => {
      try {
        const configs = ctx.configs();
        const removed = configs.unlinkProject();
        configs.write();
        print(
          success({
            unlinked: removed !== undefined,
            ...(removed !== undefined ? { projectPath: removed.projectPath, project: removed.project } : {}),
          })
        );
      } catch (err) {
        reportFailure(cmd, err, 'UNLINK_FAILED');
      }
    });
}
