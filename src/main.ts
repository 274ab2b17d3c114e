// CHANGE: Make main.ts a thin APP dispatcher
// WHY: main parses top-level arguments and delegates to a subcommand handler with its arguments
// REF: core/dispatch.ts
// SOURCE: n/a
// PURITY: APP (no process.exit; only composition)
// INVARIANT: argv is passed down explicitly; process.argv is neither read nor written here
// COMPLEXITY: O(n) where n = |argv|, plus the delegated subcommand

import { Console, Effect } from "effect";
import { match } from "ts-pattern";

import { runCardSearch } from "./app/cardSearch.js";
import { processRunContext, type RunContext } from "./app/context.js";
import { runDeckBuilder } from "./app/deckBuilder.js";
import { parseTopLevelArgs } from "./core/dispatch.js";
import { helpBanner, versionLine } from "./core/help.js";
import {
	type ExitCode,
	type SubcommandName,
	SUCCESS,
	type TopLevelCommand,
} from "./core/models.js";
import { printLines } from "./shell/output/printer.js";

export type SubcommandHandler = (
	args: readonly string[],
	context: RunContext,
) => Effect.Effect<ExitCode>;

/**
 * Handler for every subcommand name.
 */
export const SUBCOMMAND_HANDLERS: Readonly<Record<SubcommandName, SubcommandHandler>> = {
	"deck-builder": runDeckBuilder,
	"card-search": runCardSearch,
};

/**
 * Executes an already parsed top-level command.
 *
 * @param handlers - Subcommand table; tests substitute recording handlers
 * @returns Effect<ExitCode, never>: the subcommand's own code, otherwise 0
 */
export function runCommand(
	command: TopLevelCommand,
	context: RunContext,
	handlers: Readonly<Record<SubcommandName, SubcommandHandler>> = SUBCOMMAND_HANDLERS,
): Effect.Effect<ExitCode> {
	return match(command)
		.with({ kind: "help" }, () => printLines(helpBanner()).pipe(Effect.as(SUCCESS)))
		.with({ kind: "version" }, () => Console.log(versionLine()).pipe(Effect.as(SUCCESS)))
		.with({ kind: "subcommand" }, (sub) =>
			Effect.logDebug(`Dispatching to ${sub.name} with ${JSON.stringify(sub.args)}`).pipe(
				Effect.zipRight(handlers[sub.name](sub.args, context)),
			),
		)
		.exhaustive();
}

/**
 * Entry for programmatic usage (without terminating the process).
 *
 * @param argv - Arguments after the program name
 * @returns Effect<ExitCode, never>
 *
 * @invariant ∀argv made only of unknown tokens: result = 0
 * @example
 * ```ts
 * const code = await Effect.runPromise(main(["card-search", "--name", "bolt"]));
 * ```
 */
export function main(
	argv: readonly string[],
	context: RunContext = processRunContext(),
): Effect.Effect<ExitCode> {
	return runCommand(parseTopLevelArgs(argv), context);
}
