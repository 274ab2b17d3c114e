// CHANGE: Collect static help, usage and banner texts
// WHY: Texts are pure data printed by APP; tests assert them line by line
// REF: main.ts
// SOURCE: n/a
// PURITY: CORE

import { SUBCOMMANDS } from "./dispatch.js";

export const APP_NAME = "mtg-card-app";
export const APP_VERSION = "0.1.0";

export const versionLine = (): string => `${APP_NAME} ${APP_VERSION}`;

/**
 * Banner shown when no subcommand is recognised.
 *
 * @pure true
 */
export const helpBanner = (): readonly string[] => [
	"MTG Card App - An application for finding new MTG card combos",
	"",
	"Available modules:",
	...SUBCOMMANDS.map((entry) => `  - ${entry.name}: ${entry.summary}`),
	"",
	"Run with -h for help or use a subcommand",
	"",
	"You can also run modules directly:",
	"  mtg-deck-builder",
	"  mtg-card-search",
];

export const deckBuilderUsage = (defaultName: string): readonly string[] => [
	"usage: mtg-deck-builder [-h] [--name NAME] [--interactive]",
	"",
	"MTG Deck Builder - Build and manage your MTG decks",
	"",
	"options:",
	"  -h, --help     show this help message and exit",
	`  --name NAME    Name of the deck to create (default: ${defaultName})`,
	"  --interactive  Run in interactive mode",
];

export const deckBuilderBanner = (deckName: string): readonly string[] => [
	"",
	"Deck Builder - Interactive Mode",
	`Building deck: ${deckName}`,
	"",
	"Commands:",
	"  add <card_name> [quantity] - Add a card to the deck",
	"  list - List all cards in the deck",
	"  quit - Exit the deck builder",
	"",
];

export const deckBuilderHints = (): readonly string[] => [
	"",
	"",
	"To use interactive mode, run with --interactive flag:",
	"  mtg-deck-builder --interactive",
	"  mtg-card-app deck-builder --interactive",
];

export const cardSearchUsage = (): readonly string[] => [
	"usage: mtg-card-search [-h] [--name NAME] [--color COLOR] [--type TYPE] [--interactive]",
	"",
	"MTG Card Search - Search for MTG cards",
	"",
	"options:",
	"  -h, --help     show this help message and exit",
	"  --name NAME    Search for cards by name",
	"  --color COLOR  Search for cards by color (e.g., Red, Blue, Green)",
	"  --type TYPE    Search for cards by type (e.g., Instant, Creature, Land)",
	"  --interactive  Run in interactive mode",
];

export const cardSearchBanner = (): readonly string[] => [
	"",
	"Card Search - Interactive Mode",
	"",
	"Commands:",
	"  name <query> - Search by card name",
	"  color <color> - Search by color",
	"  type <type> - Search by card type",
	"  quit - Exit the search tool",
	"",
];

export const cardSearchHints = (): readonly string[] => [
	"",
	"",
	"To search cards, use:",
	"  mtg-card-search --name 'Lightning'",
	"  mtg-card-search --color Red",
	"  mtg-card-search --type Instant",
	"",
	"Or use interactive mode:",
	"  mtg-card-search --interactive",
	"  mtg-card-app card-search --interactive",
];

export const GOODBYE = "Goodbye!";
export const PROMPT = "> ";
