// CHANGE: Add unit tests for deck operations
// WHY: Entries, totals and listing lines are pure and deterministic
// REF: src/core/deck.ts
// SOURCE: n/a

import { describe, expect, it } from "vitest";

import {
	addCard,
	cardCount,
	createDeck,
	formatAdded,
	formatDeckListing,
} from "../../src/core/deck.js";
import { DECK_RULE } from "../utils/fixtures.js";

describe("addCard", () => {
	it("appends new cards in insertion order", (): void => {
		const deck = addCard(addCard(createDeck("Burn"), "Lightning Bolt", 4), "Mountain", 16);
		expect(deck.entries).toEqual([
			{ name: "Lightning Bolt", quantity: 4 },
			{ name: "Mountain", quantity: 16 },
		]);
	});

	it("keeps a repeated card as a separate entry with its own spelling", (): void => {
		const deck = addCard(addCard(createDeck("Burn"), "Lightning Bolt", 2), "lightning BOLT", 1);
		expect(deck.entries).toEqual([
			{ name: "Lightning Bolt", quantity: 2 },
			{ name: "lightning BOLT", quantity: 1 },
		]);
		expect(cardCount(deck)).toBe(3);
	});

	it("leaves the original deck untouched", (): void => {
		const empty = createDeck("Burn");
		addCard(empty, "Shock", 1);
		expect(empty.entries).toEqual([]);
	});

	it("records a zero quantity as an entry", (): void => {
		const deck = addCard(createDeck("Burn"), "Shock", 0);
		expect(formatDeckListing(deck)).toEqual([
			"",
			"Burn:",
			DECK_RULE,
			"0x Shock",
			DECK_RULE,
			"Total cards: 0",
		]);
	});
});

describe("cardCount", () => {
	it("sums quantities", (): void => {
		const deck = addCard(addCard(createDeck("Control"), "Counterspell", 4), "Island", 20);
		expect(cardCount(deck)).toBe(24);
		expect(cardCount(createDeck("Empty"))).toBe(0);
	});
});

describe("formatDeckListing", () => {
	it("reports an empty deck on one line", (): void => {
		expect(formatDeckListing(createDeck("Burn"))).toEqual(["Burn is empty"]);
	});

	it("renders entries between rules with the total", (): void => {
		const deck = addCard(addCard(createDeck("Burn"), "Lightning Bolt", 4), "Mountain", 10);
		expect(formatDeckListing(deck)).toEqual([
			"",
			"Burn:",
			DECK_RULE,
			"4x Lightning Bolt",
			"10x Mountain",
			DECK_RULE,
			"Total cards: 14",
		]);
	});
});

describe("formatAdded", () => {
	it("names quantity, card and deck", (): void => {
		expect(formatAdded("Burn", "Lava Spike", 3)).toBe("Added 3x Lava Spike to Burn");
	});
});
