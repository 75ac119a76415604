import type { Command } from 'commander';

import { createVarnishAdmin } from '@/client/index.js';
import type { VarnishAdmin, VarnishAdminOptions } from '@/client/index.js';

import { resolveConnectionOptions } from './connectionOptions.js';
import type { ConnectionFlags } from './connectionOptions.js';

/**
 * Connect, run `fn` against the client, and always `quit` afterwards.
 *
 * @param options - Client options
 * @param fn - Work to do while connected; receives the banner too
 */
export async function withVarnishAdmin<T>(
  options: VarnishAdminOptions,
  fn: (admin: VarnishAdmin, banner: string) => Promise<T>
): Promise<T> {
  const admin = createVarnishAdmin(options);
  const banner = await admin.connect();
  try {
    return await fn(admin, banner);
  } finally {
    await admin.quit();
  }
}

/**
 * Client options from the root program's global flags.
 */
export function connectionOptionsFrom(command: Command): VarnishAdminOptions {
  return resolveConnectionOptions(command.optsWithGlobals<ConnectionFlags>());
}
