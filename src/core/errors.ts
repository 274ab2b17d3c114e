// CHANGE: Introduce typed domain error ADT using Effect.Data
// WHY: Config and catalog failures are explicit, typed variants compatible with Effect
// REF: core/models.ts
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Configuration file exists but cannot be read or parsed.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Card catalog cannot be read, parsed or contains no valid card.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class CatalogError extends Data.TaggedError("CatalogError")<{
	readonly path: string;
	readonly detail: string;
}> {}

export type AppError = ConfigError | CatalogError;

/**
 * Renders an application error as a single user-facing line.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * describeError(new CatalogError({ path: "cards.json", detail: "no valid card entries" }));
 * // "Cannot load card catalog cards.json: no valid card entries"
 * ```
 */
export const describeError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "ConfigError" },
			(e) => `Invalid configuration in ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "CatalogError" },
			(e) => `Cannot load card catalog ${e.path}: ${e.detail}`,
		)
		.exhaustive();
