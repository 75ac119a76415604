#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { addConnectionOptions } from '@/commands/shared/connectionOptions.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'varnish-admin';
const CLI_DESCRIPTION = 'Talk to the Varnish Cache admin console';

const log = createLogger('cli');

/**
 * Main entry point: build the commander program and route to a command.
 */
async function main(): Promise<void> {
  // Enable early so option parsing and connection setup are traced too
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }
  log.debug(`${CLI_NAME} ${VERSION} (node ${process.version})`);

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  addConnectionOptions(program);
  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

void main();
