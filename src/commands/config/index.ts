import { Command } from 'commander';
import type { CliContext } from '../../context';
import { print, reportFailure, success } from '../../utils/output';

function configPathCommand(ctx: CliContext): Command {
  return new Command('path')
    .description('Show the config file in use and the hosts of the selected environment (RAILWAY_ENV).')
    .action((_options: unknown, cmd: Command) => {
      try {
        const configs = ctx.configs();
        print(
          success({
            path: configs.rootConfigPath,
            environment: configs.environment,
            host: configs.getHost(),
            backboard: configs.getBackboard(),
            relay: configs.getRelayHostPath(),
            load: configs.loadOutcome.kind,
          })
        );
      } catch (err) {
        reportFailure(cmd, err, 'CONFIG_FAILED');
      }
    });
}

function configResetCommand(ctx: CliContext): Command {
  return new Command('reset')
    .description('Remove all linked projects and the stored user token.')
    .action((_options: unknown, cmd: Command) => {
      try {
        const configs = ctx.configs();
        configs.reset();
        configs.write();
        print(success({ reset: true, path: configs.rootConfigPath }));
      } catch (err) {
        reportFailure(cmd, err, 'CONFIG_FAILED');
      }
    });
}

export function configCommand(ctx: CliContext): Command {
  return new Command('config')
    .description('Inspect or reset the local CLI configuration.')
    .action(function (this: Command) {
      if (this.args.length > 0) {
        this.error(`unknown command '${this.args[0]}'`);
      }
      this.help();
    })
    .addCommand(configPathCommand(ctx))
    .addCommand(configResetCommand(ctx));
}
