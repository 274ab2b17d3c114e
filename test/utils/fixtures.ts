// CHANGE: Add expected table rows of the bundled catalog
// WHY: Scenario tests compare exact padded rows
// REF: data/cards.json
// SOURCE: n/a

export const DECK_RULE = "-".repeat(40);
export const RESULTS_RULE = "-".repeat(60);

export const ROWS = {
	lightningBolt: "Lightning Bolt                 Red          Instant         CMC: 1",
	counterspell: "Counterspell                   Blue         Instant         CMC: 2",
	darkRitual: "Dark Ritual                    Black        Instant         CMC: 1",
	blackLotus: "Black Lotus                    Colorless    Artifact        CMC: 0",
	island: "Island                         Blue         Basic Land      CMC: 0",
	mountain: "Mountain                       Red          Basic Land      CMC: 0",
	swamp: "Swamp                          Black        Basic Land      CMC: 0",
	forest: "Forest                         Green        Basic Land      CMC: 0",
	plains: "Plains                         White        Basic Land      CMC: 0",
} as const;
