import { Command } from 'commander';
import type { CliContext } from '../context';
import { print, reportFailure, success } from '../utils/output';

export function logoutCommand(ctx: CliContext): Command {
  return new Command('logout')
    .description('Remove the stored user token. RAILWAY_API_TOKEN, if set, still applies.')
    .action((_options: unknown, cmd: Command) => {
      try {
        const configs = ctx.configs();
        configs.setUserToken(undefined);
        configs.write();
        print(success({ loggedOut: true, apiTokenInEnvironment: configs.getRailwayApiToken() !== undefined }));
      } catch (err) {
        reportFailure(cmd, err, 'LOGOUT_FAILED');
      }
    });
}
