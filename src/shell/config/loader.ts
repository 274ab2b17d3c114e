// CHANGE: Load mtg-card-app.config.json from the working directory
// WHY: A missing file means defaults; an unparsable one is a typed ConfigError
// REF: shell/config/json.ts
// SOURCE: n/a
// PURITY: SHELL (filesystem reads)
// EFFECT: Effect<AppConfig, ConfigError>
// INVARIANT: missing file ⇒ DEFAULT_CONFIG; present but unparsable ⇒ ConfigError

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import { type AppConfig, DEFAULT_CONFIG } from "../../core/models.js";
import { isJSONObject, isString, type JSONValue, parseJSON } from "./json.js";

export const CONFIG_FILE_NAME = "mtg-card-app.config.json";

/**
 * Builds AppConfig from parsed JSON, keeping defaults for absent or mistyped keys.
 *
 * @pure true
 * @example
 * ```ts
 * configFromJSON({ deckBuilder: { defaultName: "Burn" } });
 * // { deckBuilder: { defaultName: "Burn" }, cardSearch: {} }
 * ```
 */
export function configFromJSON(value: JSONValue): AppConfig {
	if (!isJSONObject(value)) return DEFAULT_CONFIG;

	const deckBuilder = value["deckBuilder"];
	const cardSearch = value["cardSearch"];

	const nameSetting = isJSONObject(deckBuilder)
		? deckBuilder["defaultName"]
		: undefined;
	const defaultName =
		isString(nameSetting) && nameSetting.trim().length > 0
			? nameSetting
			: DEFAULT_CONFIG.deckBuilder.defaultName;

	const catalogSetting = isJSONObject(cardSearch)
		? cardSearch["catalogPath"]
		: undefined;
	const catalogPath = isString(catalogSetting) ? catalogSetting : undefined;

	return {
		deckBuilder: { defaultName },
		cardSearch: catalogPath === undefined ? {} : { catalogPath },
	};
}

/**
 * Reads the configuration file located in `cwd`.
 *
 * @param cwd - Directory that may contain mtg-card-app.config.json
 * @returns Effect with the configuration, or ConfigError when the file is unreadable or not JSON
 *
 * @pure false (reads filesystem)
 */
export function loadAppConfig(cwd: string): Effect.Effect<AppConfig, ConfigError> {
	const configPath = path.resolve(cwd, CONFIG_FILE_NAME);
	return Effect.gen(function* () {
		if (!fs.existsSync(configPath)) {
			yield* Effect.logDebug(`No ${CONFIG_FILE_NAME} in ${cwd}, using defaults`);
			return DEFAULT_CONFIG;
		}
		const parsed = yield* Effect.try({
			try: () => parseJSON(fs.readFileSync(configPath, "utf8")),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		yield* Effect.logDebug(`Loaded configuration from ${configPath}`);
		return configFromJSON(parsed);
	});
}
