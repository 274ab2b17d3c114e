// CHANGE: Load the card catalog from JSON (bundled sample or configured file)
// WHY: Catalog entries are validated with JSON guards; malformed entries are skipped and reported
// REF: shell/config/json.ts
// SOURCE: n/a
// PURITY: SHELL (filesystem reads)
// EFFECT: Effect<readonly Card[], CatalogError>
// INVARIANT: success ⇒ at least one card; entries failing validation are skipped

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { Effect } from "effect";

import { CatalogError } from "../../core/errors.js";
import type { AppConfig, Card } from "../../core/models.js";
import {
	isArray,
	isJSONObject,
	isNumber,
	isString,
	type JSONValue,
	parseJSON,
} from "../config/json.js";

/**
 * Absolute path of the sample catalog shipped in data/cards.json.
 */
export const BUNDLED_CATALOG_PATH = fileURLToPath(
	new URL("../../../data/cards.json", import.meta.url),
);

/**
 * Validates one catalog entry.
 *
 * @pure true
 * @returns Card, or null when a field is missing or mistyped
 */
export function cardFromJSON(value: JSONValue): Card | null {
	if (!isJSONObject(value)) return null;
	const name = value["name"];
	const color = value["color"];
	const type = value["type"];
	const cmc = value["cmc"];
	if (!isString(name) || !isString(color) || !isString(type) || !isNumber(cmc)) {
		return null;
	}
	return { name, color, type, cmc };
}

/**
 * Picks the catalog file: the configured path resolved against `cwd`, else the bundled one.
 *
 * @pure true
 */
export const resolveCatalogPath = (config: AppConfig, cwd: string): string =>
	config.cardSearch.catalogPath === undefined
		? BUNDLED_CATALOG_PATH
		: path.resolve(cwd, config.cardSearch.catalogPath);

/**
 * Loads and validates a catalog file.
 *
 * @pure false (reads filesystem)
 * @postcondition result.length > 0
 */
export function loadCardCatalog(
	catalogPath: string,
): Effect.Effect<readonly Card[], CatalogError> {
	const fail = (detail: string): CatalogError =>
		new CatalogError({ path: catalogPath, detail });

	return Effect.gen(function* () {
		const parsed = yield* Effect.try({
			try: () => parseJSON(fs.readFileSync(catalogPath, "utf8")),
			catch: (error) =>
				fail(error instanceof Error ? error.message : String(error)),
		});
		if (!isArray(parsed)) {
			return yield* Effect.fail(fail("expected a JSON array of cards"));
		}

		const cards: Card[] = [];
		for (const entry of parsed) {
			const card = cardFromJSON(entry);
			if (card !== null) cards.push(card);
		}
		if (cards.length === 0) {
			return yield* Effect.fail(fail("no valid card entries"));
		}

		const skipped = parsed.length - cards.length;
		if (skipped > 0) {
			yield* Effect.logWarning(
				`Skipped ${skipped} malformed catalog entr${skipped === 1 ? "y" : "ies"} in ${catalogPath}`,
			);
		}
		yield* Effect.logDebug(`Loaded ${cards.length} cards from ${catalogPath}`);
		return cards;
	});
}
