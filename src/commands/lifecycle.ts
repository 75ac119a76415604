import type { Command } from 'commander';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { connectionOptionsFrom, withVarnishAdmin } from '@/commands/shared/session.js';

type LifecycleAction = 'start' | 'stop';

interface LifecycleResult {
  action: LifecycleAction;
  running: boolean;
}

function registerLifecycleCommand(
  program: Command,
  action: LifecycleAction,
  description: string
): void {
  program
    .command(action)
    .description(description)
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, LifecycleResult>(
        async () => {
          const running = await withVarnishAdmin(connectionOptionsFrom(command), async (admin) => {
            await (action === 'start' ? admin.start() : admin.stop());
            return admin.status();
          });
          return { success: true, data: { action, running } };
        },
        options,
        (data) => `Child ${data.running ? 'running' : 'stopped'}`
      );
    });
}

/**
 * Register start and stop commands
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerLifecycleCommands(program: Command): void {
  registerLifecycleCommand(program, 'start', 'Start the cache child process');
  registerLifecycleCommand(program, 'stop', 'Stop the cache child process');
}
