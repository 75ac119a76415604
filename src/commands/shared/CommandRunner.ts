import { VarnishAdminError } from '@/errors.js';
import { joinLines } from '@/ui/formatting.js';
import { errorSuggestion, genericError, unknownError } from '@/ui/messages/errors.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { getErrorMessage, getExitCode } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Standard options supported by CommandRunner.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export interface CommandResult<T = unknown> {
  /** Whether the command succeeded */
  success: boolean;
  /** Data to output (for successful commands) */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Optional exit code override */
  exitCode?: number;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * What a command prints and how the process should exit.
 */
export interface CommandOutcome {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Run a command handler and turn its result or error into output and an exit code.
 *
 * Errors thrown by the client keep their semantic exit code; --json turns
 * every failure into a JSON error object on stdout.
 */
export async function executeCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<CommandOutcome> {
  try {
    const result = await handler(options);

    if (!result.success) {
      const exitCode = result.exitCode ?? EXIT_CODES.GENERIC_FAILURE;
      if (options.json) {
        return {
          exitCode,
          stdout: toJson(OutputBuilder.buildJsonError(result.error ?? 'Unknown error', { exitCode })),
        };
      }
      return { exitCode, stderr: result.error ? genericError(result.error) : unknownError() };
    }

    if (options.json) {
      return {
        exitCode: EXIT_CODES.SUCCESS,
        stdout: toJson(OutputBuilder.buildJsonSuccess({ data: result.data ?? null })),
      };
    }
    if (!formatter || result.data === undefined) {
      return { exitCode: EXIT_CODES.SUCCESS, stdout: toJson(result.data ?? null) };
    }
    return { exitCode: EXIT_CODES.SUCCESS, stdout: formatter(result.data) };
  } catch (error) {
    const exitCode = getExitCode(error, EXIT_CODES.UNHANDLED_EXCEPTION);
    const suggestion = errorSuggestion(error);

    if (options.json) {
      return {
        exitCode,
        stdout: toJson(
          OutputBuilder.buildJsonError(error, {
            exitCode,
            ...(error instanceof VarnishAdminError ? { code: error.code } : {}),
            ...(suggestion !== undefined ? { suggestion } : {}),
          })
        ),
      };
    }
    return { exitCode, stderr: joinLines(genericError(getErrorMessage(error)), suggestion) };
  }
}

/**
 * Run a command, print its output and exit the process.
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async () => ({ success: true, data: { running: await admin.status() } }),
 *   options,
 *   (data) => (data.running ? 'running' : 'stopped')
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<void> {
  const outcome = await executeCommand(handler, options, formatter);
  if (outcome.stdout !== undefined) {
    console.log(outcome.stdout);
  }
  if (outcome.stderr !== undefined) {
    console.error(outcome.stderr);
  }
  process.exit(outcome.exitCode);
}
