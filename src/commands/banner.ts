import type { Command } from 'commander';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { connectionOptionsFrom, withVarnishAdmin } from '@/commands/shared/session.js';

interface BannerResult {
  host: string;
  port: number;
  banner: string;
}

/**
 * Register banner command: connect, authenticate if asked, print the greeting.
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerBannerCommand(program: Command): void {
  program
    .command('banner')
    .description('Connect and print the admin console greeting')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, BannerResult>(
        async () => {
          const data = await withVarnishAdmin(connectionOptionsFrom(command), (admin, banner) =>
            Promise.resolve({ host: admin.address.host, port: admin.address.port, banner })
          );
          return { success: true, data };
        },
        options,
        (data) => data.banner.trimEnd()
      );
    });
}
