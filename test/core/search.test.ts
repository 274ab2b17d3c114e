// CHANGE: Add unit tests for catalog search and result formatting
// WHY: Filters keep catalog order and rows keep their fixed widths
// REF: src/core/search.ts
// SOURCE: n/a

import { describe, expect, it } from "vitest";

import type { Card } from "../../src/core/models.js";
import {
	formatResults,
	searchByColor,
	searchByName,
	searchByType,
} from "../../src/core/search.js";
import { RESULTS_RULE } from "../utils/fixtures.js";

const CARDS: readonly Card[] = [
	{ name: "Lightning Bolt", color: "Red", type: "Instant", cmc: 1 },
	{ name: "Bolt Bend", color: "Red", type: "Instant", cmc: 4 },
	{ name: "Counterspell", color: "Blue", type: "Instant", cmc: 2 },
	{ name: "Island", color: "Blue", type: "Basic Land", cmc: 0 },
	{ name: "Tarmogoyf", color: "Green", type: "Creature", cmc: 2 },
];

const names = (cards: readonly Card[]): readonly string[] => cards.map((c) => c.name);

describe("searchByName", () => {
	it("matches substrings ignoring case, in catalog order", (): void => {
		expect(names(searchByName(CARDS, "BOLT"))).toEqual(["Lightning Bolt", "Bolt Bend"]);
	});

	it("returns nothing for an unmatched query", (): void => {
		expect(searchByName(CARDS, "lotus")).toEqual([]);
	});

	it("matches everything for an empty query", (): void => {
		expect(searchByName(CARDS, "")).toHaveLength(CARDS.length);
	});
});

describe("searchByColor and searchByType", () => {
	it("filters by color substring", (): void => {
		expect(names(searchByColor(CARDS, "blu"))).toEqual(["Counterspell", "Island"]);
	});

	it("filters by type substring", (): void => {
		expect(names(searchByType(CARDS, "land"))).toEqual(["Island"]);
		expect(names(searchByType(CARDS, "instant"))).toEqual([
			"Lightning Bolt",
			"Bolt Bend",
			"Counterspell",
		]);
	});
});

describe("formatResults", () => {
	it("prints a single line when nothing matched", (): void => {
		expect(formatResults([])).toEqual(["No cards found"]);
	});

	it("pads name, color and type into fixed columns", (): void => {
		expect(formatResults(searchByName(CARDS, "goyf"))).toEqual([
			"",
			"Found 1 card(s):",
			RESULTS_RULE,
			"Tarmogoyf                      Green        Creature        CMC: 2",
			RESULTS_RULE,
		]);
	});

	it("does not truncate values longer than their column", (): void => {
		const long: Card = {
			name: "Asmoranomardicadaistinaculdacar",
			color: "Red",
			type: "Legendary Creature",
			cmc: 2,
		};
		expect(formatResults([long])[3]).toBe(
			"Asmoranomardicadaistinaculdacar Red          Legendary Creature CMC: 2",
		);
	});
});
