import { Command } from 'commander';
import type { CliContext } from '../context';
import { print, reportFailure, success } from '../utils/output';

interface LinkOptions {
  project: string;
  environment: string;
  projectName?: string;
  environmentName?: string;
}

/**
 * Bind the current directory to a remote project and environment.
 */
export function linkCommand(ctx: CliContext): Command {
  return new Command('link')
    .description(
      'Link the current directory to a project environment.\n\n' +
        'The link applies to this directory and every subdirectory without a link\n' +
        'of its own. Linking again replaces the previous link; the service link is\n' +
        'cleared.'
    )
    .requiredOption('-p, --project <id>', 'project ID')
    .requiredOption('-e, --environment <id>', 'environment ID')
    .option('--project-name <name>', 'project display name')
    .option('--environment-name <name>', 'environment display name')
    .action((options: LinkOptions, cmd: Command) => {
      try {
        const configs = ctx.configs();
        const linked = configs.linkProject(
          options.project,
          options.projectName,
          options.environment,
          options.environmentName
        );
        configs.write();
        print(success(linked));
      } catch (err) {
        reportFailure(cmd, err, 'LINK_FAILED');
      }
    });
}
