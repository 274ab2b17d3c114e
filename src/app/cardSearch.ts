// CHANGE: Add card-search subcommand over the bundled card catalog
// WHY: Flag searches, example session and interactive prompt share one catalog load and one exit-code mapping
// REF: app/deckBuilder.ts
// SOURCE: n/a
// PURITY: APP (no process.exit; returns ExitCode as value)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: exit code is 1 only when the configuration or the catalog cannot be loaded

import { Console, Effect } from "effect";
import { match } from "ts-pattern";

import {
	cardSearchBanner,
	cardSearchHints,
	cardSearchUsage,
	GOODBYE,
} from "../core/help.js";
import {
	type Card,
	type CardSearchOptions,
	type ExitCode,
	FAILURE,
	SUCCESS,
} from "../core/models.js";
import { parseSearchCommand, type SearchCommand, type SearchField } from "../core/repl.js";
import {
	formatResults,
	searchByColor,
	searchByName,
	searchByType,
} from "../core/search.js";
import { loadCardCatalog, resolveCatalogPath } from "../shell/catalog/loader.js";
import { parseCardSearchArgs } from "../shell/config/cli.js";
import { loadAppConfig } from "../shell/config/loader.js";
import { printLines, reportFatal } from "../shell/output/printer.js";
import type { RunContext } from "./context.js";
import { CONTINUE, type LoopStep, STOP, withPromptLoop } from "./promptLoop.js";

const SEARCHES: Readonly<
	Record<SearchField, (cards: readonly Card[], query: string) => readonly Card[]>
> = {
	name: searchByName,
	color: searchByColor,
	type: searchByType,
};

/**
 * Header printed before the results of a flag-driven search.
 *
 * @pure true
 */
export const searchHeader = (field: SearchField, query: string): string =>
	match(field)
		.with("name", () => `Searching for cards with name containing '${query}':`)
		.with("color", "type", () => `Searching for ${query} cards:`)
		.exhaustive();

const printSearch = (
	cards: readonly Card[],
	field: SearchField,
	query: string,
): Effect.Effect<void> => printLines(formatResults(SEARCHES[field](cards, query)));

/**
 * Filters given on the command line, in the fixed order name, color, type.
 *
 * @pure true
 */
export function requestedSearches(
	options: CardSearchOptions,
): ReadonlyArray<{ readonly field: SearchField; readonly query: string }> {
	const fields: readonly SearchField[] = ["name", "color", "type"];
	return fields.flatMap((field) => {
		const query = options[field];
		return query === undefined ? [] : [{ field, query }];
	});
}

function exampleSession(cards: readonly Card[]): Effect.Effect<void> {
	return Effect.gen(function* () {
		yield* printLines(["", "Card Search Module - Example Usage", "", "Searching for 'bolt':"]);
		yield* printSearch(cards, "name", "bolt");
		yield* printLines(["", "", "Searching for Blue cards:"]);
		yield* printSearch(cards, "color", "Blue");
		yield* printLines(cardSearchHints());
	});
}

function flagSession(
	cards: readonly Card[],
	searches: ReadonlyArray<{ readonly field: SearchField; readonly query: string }>,
): Effect.Effect<void> {
	return Effect.forEach(
		searches,
		({ field, query }) =>
			printLines(["", searchHeader(field, query)]).pipe(
				Effect.zipRight(printSearch(cards, field, query)),
			),
		{ discard: true },
	);
}

const handleSearchCommand = (
	cards: readonly Card[],
	command: SearchCommand,
): Effect.Effect<LoopStep> =>
	match<SearchCommand, Effect.Effect<LoopStep>>(command)
		.with({ kind: "empty" }, () => Effect.succeed(CONTINUE))
		.with({ kind: "quit" }, () => Console.log(GOODBYE).pipe(Effect.as(STOP)))
		.with({ kind: "search" }, (search) =>
			printSearch(cards, search.field, search.query).pipe(Effect.as(CONTINUE)),
		)
		.with({ kind: "unknown" }, () =>
			Console.log("Unknown command. Try 'name', 'color', 'type', or 'quit'").pipe(
				Effect.as(CONTINUE),
			),
		)
		.exhaustive();

function interactiveSession(
	cards: readonly Card[],
	context: RunContext,
): Effect.Effect<void> {
	return printLines(cardSearchBanner()).pipe(
		Effect.zipRight(
			withPromptLoop(context.openInput, (line) =>
				handleSearchCommand(cards, parseSearchCommand(line)),
			),
		),
	);
}

/**
 * Runs the card-search subcommand.
 *
 * @param args - Arguments following the subcommand name; never read from process.argv
 * @param context - Working directory (config, relative catalog path) and interactive input
 * @returns Effect<ExitCode, never>: 0 on success, 1 when config or catalog cannot be loaded
 */
export function runCardSearch(
	args: readonly string[],
	context: RunContext,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const options = parseCardSearchArgs(args);
		yield* Effect.logDebug(`card-search options: ${JSON.stringify(options)}`);
		if (options.help) {
			yield* printLines(cardSearchUsage());
			return SUCCESS;
		}

		const config = yield* loadAppConfig(context.cwd);
		const cards = yield* loadCardCatalog(resolveCatalogPath(config, context.cwd));

		const searches = requestedSearches(options);
		if (options.interactive) {
			yield* interactiveSession(cards, context);
		} else if (searches.length > 0) {
			yield* flagSession(cards, searches);
		} else {
			yield* exampleSession(cards);
		}
		return SUCCESS;
	}).pipe(Effect.catchAll((error) => reportFatal(error).pipe(Effect.as(FAILURE))));
}
