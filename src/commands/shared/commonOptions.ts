import { Option } from 'commander';

/**
 * Shared --json flag for commands that support machine-readable output.
 *
 * @example
 * ```typescript
 * program
 *   .command('status')
 *   .addOption(jsonOption)
 *   .action((options) => {
 *     if (options.json) {
 *       console.log(JSON.stringify(data));
 *     }
 *   });
 * ```
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);
