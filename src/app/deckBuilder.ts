// CHANGE: Add deck-builder subcommand with example session and interactive prompt
// WHY: Deck state lives in a Ref owned by the prompt loop; --help is answered before the configuration is required
// REF: core/deck.ts
// SOURCE: https://effect.website/docs/state-management/ref
// PURITY: APP (no process.exit; returns ExitCode as value)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: unknown flags and prompt input never change the exit code; only a broken config does

import { Console, Effect, Ref } from "effect";
import { match } from "ts-pattern";

import { addCard, createDeck, formatAdded, formatDeckListing } from "../core/deck.js";
import { describeError } from "../core/errors.js";
import {
	deckBuilderBanner,
	deckBuilderHints,
	deckBuilderUsage,
	GOODBYE,
} from "../core/help.js";
import {
	type Deck,
	DEFAULT_CONFIG,
	type ExitCode,
	FAILURE,
	SUCCESS,
} from "../core/models.js";
import { type DeckCommand, parseDeckCommand } from "../core/repl.js";
import { parseDeckBuilderArgs } from "../shell/config/cli.js";
import { loadAppConfig } from "../shell/config/loader.js";
import { printLines, reportFatal } from "../shell/output/printer.js";
import type { RunContext } from "./context.js";
import { CONTINUE, type LoopStep, STOP, withPromptLoop } from "./promptLoop.js";

const EXAMPLE_CARDS: ReadonlyArray<{ readonly name: string; readonly quantity: number }> = [
	{ name: "Lightning Bolt", quantity: 4 },
	{ name: "Counterspell", quantity: 4 },
	{ name: "Island", quantity: 10 },
	{ name: "Mountain", quantity: 10 },
];

/**
 * Adds a card and prints the confirmation line.
 */
const addAndReport = (
	deck: Deck,
	cardName: string,
	quantity: number,
): Effect.Effect<Deck> =>
	Console.log(formatAdded(deck.name, cardName, quantity)).pipe(
		Effect.as(addCard(deck, cardName, quantity)),
	);

function exampleSession(deckName: string): Effect.Effect<void> {
	return Effect.gen(function* () {
		yield* printLines(["", "Deck Builder Module - Example Usage", `Creating deck: ${deckName}`, ""]);
		const deck = yield* Effect.reduce(EXAMPLE_CARDS, createDeck(deckName), (current, card) =>
			addAndReport(current, card.name, card.quantity),
		);
		yield* Console.log("");
		yield* printLines(formatDeckListing(deck));
		yield* printLines(deckBuilderHints());
	});
}

/**
 * Handles one parsed prompt command against the deck held in `deckRef`.
 */
const handleDeckCommand = (
	deckRef: Ref.Ref<Deck>,
	command: DeckCommand,
): Effect.Effect<LoopStep> =>
	match<DeckCommand, Effect.Effect<LoopStep>>(command)
		.with({ kind: "empty" }, () => Effect.succeed(CONTINUE))
		.with({ kind: "quit" }, () => Console.log(GOODBYE).pipe(Effect.as(STOP)))
		.with({ kind: "list" }, () =>
			Ref.get(deckRef).pipe(
				Effect.flatMap((deck) => printLines(formatDeckListing(deck))),
				Effect.as(CONTINUE),
			),
		)
		.with({ kind: "add" }, (add) =>
			Ref.get(deckRef).pipe(
				Effect.flatMap((deck) => addAndReport(deck, add.name, add.quantity)),
				Effect.flatMap((deck) => Ref.set(deckRef, deck)),
				Effect.as(CONTINUE),
			),
		)
		.with({ kind: "unknown" }, () =>
			Console.log("Unknown command. Try 'add', 'list', or 'quit'").pipe(
				Effect.as(CONTINUE),
			),
		)
		.exhaustive();

function interactiveSession(deckName: string, context: RunContext): Effect.Effect<void> {
	return Effect.gen(function* () {
		yield* printLines(deckBuilderBanner(deckName));
		const deckRef = yield* Ref.make(createDeck(deckName));
		yield* withPromptLoop(context.openInput, (line) =>
			handleDeckCommand(deckRef, parseDeckCommand(line)),
		);
	});
}

/**
 * Usage shows the configured default deck name; a broken configuration
 * falls back to the built-in default so that help always succeeds.
 */
const printUsage = (cwd: string): Effect.Effect<void> =>
	loadAppConfig(cwd).pipe(
		Effect.catchAll((error) =>
			Effect.logDebug(`Usage falls back to defaults: ${describeError(error)}`).pipe(
				Effect.as(DEFAULT_CONFIG),
			),
		),
		Effect.flatMap((config) => printLines(deckBuilderUsage(config.deckBuilder.defaultName))),
	);

/**
 * Runs the deck-builder subcommand.
 *
 * @param args - Arguments following the subcommand name; never read from process.argv
 * @param context - Working directory and input used by interactive mode
 * @returns Effect<ExitCode, never>: 0 on success or help, 1 when the configuration file is broken
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(
 *   runDeckBuilder(["--name", "Burn"], processRunContext()),
 * );
 * ```
 */
export function runDeckBuilder(
	args: readonly string[],
	context: RunContext,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const options = parseDeckBuilderArgs(args);
		yield* Effect.logDebug(`deck-builder options: ${JSON.stringify(options)}`);
		if (options.help) {
			yield* printUsage(context.cwd);
			return SUCCESS;
		}

		const config = yield* loadAppConfig(context.cwd);
		const deckName = options.name ?? config.deckBuilder.defaultName;
		if (options.interactive) {
			yield* interactiveSession(deckName, context);
		} else {
			yield* exampleSession(deckName);
		}
		return SUCCESS;
	}).pipe(Effect.catchAll((error) => reportFatal(error).pipe(Effect.as(FAILURE))));
}
