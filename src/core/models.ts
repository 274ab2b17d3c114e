// CHANGE: Introduce Functional Core domain models (pure, immutable)
// WHY: CORE contains only types, constants and invariants
// REF: core/errors.ts
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable

/**
 * Exit code returned by the entry point and every subcommand.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

export const SUCCESS: ExitCode = 0;
export const FAILURE: ExitCode = 1;

/**
 * Names accepted as the first positional argument of `mtg-card-app`.
 */
export type SubcommandName = "deck-builder" | "card-search";

/**
 * Outcome of top-level argument parsing.
 *
 * @invariant kind = "subcommand" → args excludes the subcommand token itself
 */
export type TopLevelCommand =
	| { readonly kind: "help" }
	| { readonly kind: "version" }
	| {
			readonly kind: "subcommand";
			readonly name: SubcommandName;
			readonly args: readonly string[];
	  };

/**
 * Catalog entry.
 */
export interface Card {
	readonly name: string;
	readonly color: string;
	readonly type: string;
	readonly cmc: number;
}

export interface DeckEntry {
	readonly name: string;
	readonly quantity: number;
}

/**
 * Deck list. Entries are kept in insertion order; a card added twice has two entries.
 *
 * @invariant ∀ e ∈ entries: Number.isInteger(e.quantity) ∧ e.quantity ≥ 0
 */
export interface Deck {
	readonly name: string;
	readonly entries: readonly DeckEntry[];
}

/**
 * An absent name means the configured default deck name.
 */
export interface DeckBuilderOptions {
	readonly name?: string;
	readonly interactive: boolean;
	readonly help: boolean;
}

/**
 * Filters are optional: an absent filter is not applied and not printed.
 */
export interface CardSearchOptions {
	readonly name?: string;
	readonly color?: string;
	readonly type?: string;
	readonly interactive: boolean;
	readonly help: boolean;
}

/**
 * Settings read from mtg-card-app.config.json.
 */
export interface AppConfig {
	readonly deckBuilder: {
		readonly defaultName: string;
	};
	readonly cardSearch: {
		readonly catalogPath?: string;
	};
}

export const DEFAULT_DECK_NAME = "My Deck";

export const DEFAULT_CONFIG: AppConfig = {
	deckBuilder: { defaultName: DEFAULT_DECK_NAME },
	cardSearch: {},
};
