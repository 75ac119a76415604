import type { Command } from 'commander';

import { registerBanCommands } from '@/commands/ban.js';
import { registerBannerCommand } from '@/commands/banner.js';
import { registerLifecycleCommands } from '@/commands/lifecycle.js';
import { registerStatusCommand } from '@/commands/status.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Connection:'),
  registerBannerCommand,

  addCommandGroup('Child Process:'),
  registerStatusCommand,
  registerLifecycleCommands,

  addCommandGroup('Cache Invalidation:'),
  registerBanCommands,
];
