// CHANGE: Case-insensitive catalog filtering and result table rendering
// WHY: Filters and the fixed-width table are pure and shared by flags and the prompt
// REF: app/cardSearch.ts
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: filters preserve catalog order; output is a subsequence of the input
// COMPLEXITY: O(n) per query where n = |cards|

import type { Card } from "./models.js";

const RESULTS_RULE = "-".repeat(60);

type CardField = "name" | "color" | "type";

const searchBy =
	(field: CardField) =>
	(cards: readonly Card[], query: string): readonly Card[] => {
		const needle = query.toLowerCase();
		return cards.filter((card) => card[field].toLowerCase().includes(needle));
	};

/**
 * Cards whose name contains `query`, ignoring case.
 *
 * @pure true
 */
export const searchByName = searchBy("name");

/**
 * Cards whose color contains `query`, ignoring case ("Blu" matches "Blue").
 *
 * @pure true
 */
export const searchByColor = searchBy("color");

/**
 * Cards whose type line contains `query`, ignoring case ("land" matches "Basic Land").
 *
 * @pure true
 */
export const searchByType = searchBy("type");

const formatRow = (card: Card): string =>
	`${card.name.padEnd(30)} ${card.color.padEnd(12)} ${card.type.padEnd(15)} CMC: ${card.cmc}`;

/**
 * Renders search results as a fixed-width table.
 *
 * @pure true
 * @postcondition cards = [] → ["No cards found"]
 */
export function formatResults(cards: readonly Card[]): readonly string[] {
	if (cards.length === 0) return ["No cards found"];
	return [
		"",
		`Found ${cards.length} card(s):`,
		RESULTS_RULE,
		...cards.map(formatRow),
		RESULTS_RULE,
	];
}
