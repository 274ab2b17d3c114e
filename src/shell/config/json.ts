// CHANGE: Define JSON types to avoid 'unknown'/'any'
// WHY: Project rules forbid 'unknown' and 'any'; parsed files are narrowed with guards
// REF: shell/config/loader.ts
// SOURCE: n/a
// PURITY: CORE helpers living in SHELL next to their only callers

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

export function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return (
		value !== undefined &&
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

export function isString(value: JSONValue | undefined): value is string {
	return typeof value === "string";
}

export function isNumber(value: JSONValue | undefined): value is number {
	return typeof value === "number" && Number.isFinite(value);
}

export function isArray(
	value: JSONValue | undefined,
): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

/**
 * `JSON.parse` narrowed to the JSON value model.
 *
 * @throws SyntaxError when `raw` is not valid JSON
 */
export function parseJSON(raw: string): JSONValue {
	return JSON.parse(raw) as JSONValue;
}
