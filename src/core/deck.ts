// CHANGE: Introduce immutable deck list operations and listing format
// WHY: Deck changes are pure values so the interactive prompt and the example session share them
// REF: core/models.ts
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: entries keep insertion order; adding never merges or drops an entry

import type { Deck } from "./models.js";

const LISTING_RULE = "-".repeat(40);

/**
 * @pure true
 * @postcondition createDeck(name).entries = []
 */
export const createDeck = (name: string): Deck => ({ name, entries: [] });

/**
 * Appends an entry for `quantity` copies of a card.
 *
 * Repeated names are kept as separate entries, in insertion order; the
 * listing and the total count every entry.
 *
 * @pure true
 * @postcondition result.entries = [...deck.entries, { name: cardName, quantity }]
 * @postcondition cardCount(result) = cardCount(deck) + quantity
 * @complexity O(n) where n = |deck.entries|
 */
export const addCard = (deck: Deck, cardName: string, quantity: number): Deck => ({
	name: deck.name,
	entries: [...deck.entries, { name: cardName, quantity }],
});

/**
 * @pure true
 * @complexity O(n)
 */
export const cardCount = (deck: Deck): number =>
	deck.entries.reduce((total, entry) => total + entry.quantity, 0);

/**
 * Confirmation line printed after a successful add.
 *
 * @pure true
 */
export const formatAdded = (
	deckName: string,
	cardName: string,
	quantity: number,
): string => `Added ${quantity}x ${cardName} to ${deckName}`;

/**
 * Renders the deck listing.
 *
 * @pure true
 * @example
 * ```ts
 * formatDeckListing(createDeck("Burn")); // ["Burn is empty"]
 * ```
 */
export function formatDeckListing(deck: Deck): readonly string[] {
	if (deck.entries.length === 0) return [`${deck.name} is empty`];
	return [
		"",
		`${deck.name}:`,
		LISTING_RULE,
		...deck.entries.map((entry) => `${entry.quantity}x ${entry.name}`),
		LISTING_RULE,
		`Total cards: ${cardCount(deck)}`,
	];
}
