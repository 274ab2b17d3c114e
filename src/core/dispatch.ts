// CHANGE: Top-level argument parsing for mtg-card-app
// WHY: Subcommand arguments are returned as data and handed to the handler as a parameter
// REF: main.ts
// SOURCE: n/a
// PURITY: CORE
// FORMAT THEOREM: ∀argv: parseTopLevelArgs(argv) ∈ {help, version, subcommand(name, rest)}
// INVARIANT: unknown input never fails; it yields "help" or is forwarded to the subcommand
// COMPLEXITY: O(n) where n = |argv|

import type { SubcommandName, TopLevelCommand } from "./models.js";

/**
 * Subcommands with their one-line description, in banner order.
 */
export const SUBCOMMANDS: ReadonlyArray<{
	readonly name: SubcommandName;
	readonly summary: string;
}> = [
	{ name: "deck-builder", summary: "Build and manage MTG decks" },
	{ name: "card-search", summary: "Search for MTG cards" },
];

const isSubcommandName = (token: string): token is SubcommandName =>
	SUBCOMMANDS.some((entry) => entry.name === token);

const HELP_FLAGS: ReadonlySet<string> = new Set(["-h", "--help"]);

/**
 * Parses the arguments that follow the program name.
 *
 * - `--version` or `-h`/`--help` before any positional token short-circuit.
 * - The first positional token selects the subcommand; anything else shows help.
 * - Unknown flags seen before the subcommand are forwarded ahead of the tokens after it.
 *
 * @pure true
 * @example
 * ```ts
 * parseTopLevelArgs(["--verbose", "card-search", "--name", "bolt"]);
 * // { kind: "subcommand", name: "card-search", args: ["--verbose", "--name", "bolt"] }
 * parseTopLevelArgs(["frobnicate"]); // { kind: "help" }
 * ```
 */
export function parseTopLevelArgs(argv: readonly string[]): TopLevelCommand {
	const leadingFlags: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const arg = argv.at(i) ?? "";
		if (arg.length === 0) continue;
		if (arg === "--version") return { kind: "version" };
		if (HELP_FLAGS.has(arg)) return { kind: "help" };
		if (arg.startsWith("-")) {
			leadingFlags.push(arg);
			continue;
		}
		if (!isSubcommandName(arg)) return { kind: "help" };
		return {
			kind: "subcommand",
			name: arg,
			args: [...leadingFlags, ...argv.slice(i + 1)],
		};
	}
	return { kind: "help" };
}
