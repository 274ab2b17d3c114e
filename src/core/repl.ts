// CHANGE: Parsers for the interactive prompt lines of deck-builder and card-search
// WHY: Prompt input becomes a command union matched exhaustively in APP
// REF: https://github.com/gvergnaud/ts-pattern
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: total functions, every input line maps to exactly one command

import { match, P } from "ts-pattern";

export type DeckCommand =
	| { readonly kind: "empty" }
	| { readonly kind: "quit" }
	| { readonly kind: "list" }
	| { readonly kind: "add"; readonly name: string; readonly quantity: number }
	| { readonly kind: "unknown" };

export type SearchField = "name" | "color" | "type";

export type SearchCommand =
	| { readonly kind: "empty" }
	| { readonly kind: "quit" }
	| { readonly kind: "search"; readonly field: SearchField; readonly query: string }
	| { readonly kind: "unknown" };

const DIGITS = /^\d+$/u;

/**
 * `add Lightning Bolt 4` → name "Lightning Bolt", quantity 4.
 * A trailing number is a quantity only when a name precedes it,
 * so `add 4` adds one copy of a card called "4".
 */
function parseAdd(rest: readonly string[]): DeckCommand {
	const last = rest.at(-1) ?? "";
	if (rest.length > 1 && DIGITS.test(last)) {
		return {
			kind: "add",
			name: rest.slice(0, -1).join(" "),
			quantity: Number.parseInt(last, 10),
		};
	}
	return { kind: "add", name: rest.join(" "), quantity: 1 };
}

/**
 * Parses one deck-builder prompt line.
 *
 * @pure true
 * @example
 * ```ts
 * parseDeckCommand("ADD Island 10"); // { kind: "add", name: "Island", quantity: 10 }
 * parseDeckCommand("add");           // { kind: "unknown" }
 * ```
 */
export function parseDeckCommand(line: string): DeckCommand {
	const tokens = line.trim().split(/\s+/u).filter((t) => t.length > 0);
	const [head, ...rest] = tokens;
	if (head === undefined) return { kind: "empty" };
	return match({ command: head.toLowerCase(), rest })
		.with({ command: "quit" }, (): DeckCommand => ({ kind: "quit" }))
		.with({ command: "list" }, (): DeckCommand => ({ kind: "list" }))
		.with({ command: "add", rest: [P.string, ...P.array(P.string)] }, (c) =>
			parseAdd(c.rest),
		)
		.otherwise((): DeckCommand => ({ kind: "unknown" }));
}

const SEARCH_LINE = /^(\S+)(?:\s+(.+))?$/su;

/**
 * Parses one card-search prompt line, splitting once after the command word.
 *
 * @pure true
 * @example
 * ```ts
 * parseSearchCommand("name  lightning bolt"); // { kind: "search", field: "name", query: "lightning bolt" }
 * parseSearchCommand("color");                // { kind: "unknown" }
 * ```
 */
export function parseSearchCommand(line: string): SearchCommand {
	const trimmed = line.trim();
	if (trimmed.length === 0) return { kind: "empty" };
	const parts = SEARCH_LINE.exec(trimmed);
	const command = (parts?.[1] ?? "").toLowerCase();
	const query = parts?.[2];
	return match({ command, query })
		.with({ command: "quit" }, (): SearchCommand => ({ kind: "quit" }))
		.with(
			{ command: P.union("name", "color", "type"), query: P.string },
			(c): SearchCommand => ({ kind: "search", field: c.command, query: c.query }),
		)
		.otherwise((): SearchCommand => ({ kind: "unknown" }));
}
