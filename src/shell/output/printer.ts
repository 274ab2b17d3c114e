// CHANGE: Console output helpers built on effect's Console service
// WHY: Output stays in SHELL; APP composes it as effects
// REF: https://effect.website/docs/requirements-management/default-services
// SOURCE: n/a
// PURITY: SHELL (console I/O)

import { Console, Effect } from "effect";

import { type AppError, describeError } from "../../core/errors.js";

/**
 * Prints each line to stdout, in order.
 *
 * @effect Effect<void>
 * @complexity O(n) where n = |lines|
 */
export const printLines = (lines: readonly string[]): Effect.Effect<void> =>
	Effect.forEach(lines, (line) => Console.log(line), { discard: true });

/**
 * Prints `Error: <message>` for a failure raised while handling a prompt command.
 */
export const printCommandError = (message: string): Effect.Effect<void> =>
	Console.log(`Error: ${message}`);

/**
 * Prints `Error: <message>` to stderr for a failure that ends the subcommand.
 */
export const reportFatal = (error: AppError): Effect.Effect<void> =>
	Console.error(`Error: ${describeError(error)}`);
