// CHANGE: Public API for library consumers
// WHY: Programmatic callers get main and the subcommands without process termination
// REF: main.ts
// SOURCE: n/a
// PURITY: Re-exports only (meta-module)

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS (programmatic, never terminate the process)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Entry point and subcommand dispatch.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { main } from "mtg-card-app";
 *
 * const exitCode = await Effect.runPromise(main(["card-search", "--color", "Red"]));
 * ```
 */
export { main, runCommand, SUBCOMMAND_HANDLERS } from "./main.js";
export type { SubcommandHandler } from "./main.js";
export { runCardSearch } from "./app/cardSearch.js";
export { runDeckBuilder } from "./app/deckBuilder.js";
export { processRunContext } from "./app/context.js";
export type { RunContext } from "./app/context.js";
export type { LineSource } from "./shell/io/lines.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	AppConfig,
	Card,
	CardSearchOptions,
	Deck,
	DeckBuilderOptions,
	DeckEntry,
	ExitCode,
	SubcommandName,
	TopLevelCommand,
} from "./core/models.js";
export { parseTopLevelArgs, SUBCOMMANDS } from "./core/dispatch.js";
export { addCard, cardCount, createDeck, formatDeckListing } from "./core/deck.js";
export {
	formatResults,
	searchByColor,
	searchByName,
	searchByType,
} from "./core/search.js";
export {
	CatalogError,
	ConfigError,
	describeError,
} from "./core/errors.js";
export type { AppError } from "./core/errors.js";
