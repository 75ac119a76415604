import type { Command } from 'commander';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { connectionOptionsFrom, withVarnishAdmin } from '@/commands/shared/session.js';

interface BanResult {
  command: string;
  response: string;
}

function formatBan(data: BanResult): string {
  return data.response.trim() || `${data.command}: ok`;
}

/**
 * Register ban and ban-url commands
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerBanCommands(program: Command): void {
  program
    .command('ban')
    .description('Invalidate objects matching a ban expression')
    .argument('<expression...>', 'Ban expression, e.g. req.http.host == example.com')
    .addOption(jsonOption)
    .action(async (expression: string[], options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, BanResult>(
        async () => {
          const response = await withVarnishAdmin(connectionOptionsFrom(command), (admin) =>
            admin.purge(expression.join(' '))
          );
          return { success: true, data: { command: 'ban', response } };
        },
        options,
        formatBan
      );
    });

  program
    .command('ban-url')
    .description('Invalidate objects whose URL matches a regular expression')
    .argument('<url>', 'URL pattern, e.g. ^/assets/')
    .addOption(jsonOption)
    .action(async (url: string, options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, BanResult>(
        async () => {
          const response = await withVarnishAdmin(connectionOptionsFrom(command), (admin) =>
            admin.purgeUrl(url)
          );
          return { success: true, data: { command: 'ban-url', response } };
        },
        options,
        formatBan
      );
    });
}
