import type { Command } from 'commander';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { connectionOptionsFrom, withVarnishAdmin } from '@/commands/shared/session.js';
import type { ChildState } from '@/types.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface StatusResult {
  state: ChildState;
  running: boolean;
}

/**
 * Format status for human-readable output.
 */
export function formatStatus(data: StatusResult): string {
  return `Child in state ${data.state}`;
}

/**
 * Register status command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show whether the cache child process is running')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, StatusResult>(
        async () => {
          const state = await withVarnishAdmin(connectionOptionsFrom(command), (admin) =>
            admin.childState()
          );
          if (state === 'unreachable') {
            return {
              success: false,
              error: 'status command failed',
              exitCode: EXIT_CODES.CONNECTION_FAILURE,
            };
          }
          return { success: true, data: { state, running: state === 'running' } };
        },
        options,
        formatStatus
      );
    });
}
