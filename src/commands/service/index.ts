import { Command } from 'commander';
import type { CliContext } from '../../context';
import { print, reportFailure, success } from '../../utils/output';

function serviceLinkCommand(ctx: CliContext): Command {
  return new Command('link')
    .description('Link a service to the closest linked project.')
    .argument('<serviceId>', 'service ID')
    .action((serviceId: string, _options: unknown, cmd: Command) => {
      try {
        const configs = ctx.configs();
        const linked = configs.linkService(serviceId);
        configs.write();
        print(success(linked));
      } catch (err) {
        reportFailure(cmd, err, 'SERVICE_LINK_FAILED');
      }
    });
}

function serviceUnlinkCommand(ctx: CliContext): Command {
  return new Command('unlink')
    .description('Clear the service of the closest linked project. Safe to repeat.')
    .action((_options: unknown, cmd: Command) => {
      try {
        const configs = ctx.configs();
        const linked = configs.unlinkService();
        configs.write();
        print(success(linked));
      } catch (err) {
        reportFailure(cmd, err, 'SERVICE_UNLINK_FAILED');
      }
    });
}

export function serviceCommand(ctx: CliContext): Command {
  return new Command('service')
    .description(
      'Manage the service linked to the current project.\n\n' +
        'Requires a linked directory; not available while RAILWAY_TOKEN is set.'
    )
    .action(function (this: Command) {
      if (this.args.length > 0) {
        this.error(`unknown command '${this.args[0]}'`);
      }
      this.help();
    })
    .addCommand(serviceLinkCommand(ctx))
    .addCommand(serviceUnlinkCommand(ctx));
}
