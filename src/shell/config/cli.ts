// CHANGE: Argument parsing for the deck-builder and card-search subcommands
// WHY: Flag tables keep each parser below the complexity limit
// REF: shell/config/loader.ts
// SOURCE: n/a
// PURITY: SHELL boundary helpers; the parsers themselves are pure over their input
// INVARIANT: parsing never fails; unknown flags and stray positionals are ignored

import type {
	CardSearchOptions,
	DeckBuilderOptions,
} from "../../core/models.js";

interface ArgProcessResult<S> {
	readonly state: S;
	readonly skipNext: boolean;
}

type FlagHandler<S> = (
	args: readonly string[],
	index: number,
	current: S,
) => ArgProcessResult<S> | null;

type FlagTable<S> = Readonly<Record<string, FlagHandler<S>>>;

/**
 * Handler for a flag that consumes the following token as its value.
 * Returns null when the flag is the last token, leaving the state unchanged.
 */
function createValueFlagHandler<S, K extends keyof S>(
	key: K,
	toValue: (raw: string) => S[K],
): FlagHandler<S> {
	return (args, index, current) => {
		const raw = args.at(index + 1);
		if (raw === undefined) return null;
		return { state: { ...current, [key]: toValue(raw) }, skipNext: true };
	};
}

function createBooleanFlagHandler<S, K extends keyof S>(
	key: K,
	toValue: () => S[K],
): FlagHandler<S> {
	return (_args, _index, current) => ({
		state: { ...current, [key]: toValue() },
		skipNext: false,
	});
}

/**
 * Splits `--flag=value` into `--flag value` for flags that take a value.
 *
 * @pure true
 * @example
 * ```ts
 * expandInlineValues(["--name=Mono Red", "-h"], new Set(["--name"]));
 * // ["--name", "Mono Red", "-h"]
 * ```
 */
export function expandInlineValues(
	args: readonly string[],
	valueFlags: ReadonlySet<string>,
): readonly string[] {
	return args.flatMap((arg) => {
		const eq = arg.indexOf("=");
		if (!arg.startsWith("--") || eq < 0) return [arg];
		const flag = arg.slice(0, eq);
		return valueFlags.has(flag) ? [flag, arg.slice(eq + 1)] : [arg];
	});
}

function runFlagTable<S>(
	args: readonly string[],
	table: FlagTable<S>,
	initial: S,
): S {
	const valueFlags = new Set(
		Object.keys(table).filter((flag) => flag.startsWith("--")),
	);
	const tokens = expandInlineValues(args, valueFlags);
	let state = initial;
	for (let i = 0; i < tokens.length; i++) {
		const arg = tokens.at(i) ?? "";
		if (arg.length === 0) continue;

		const handler: FlagHandler<S> | undefined = table[arg];
		if (handler === undefined) continue;

		const result = handler(tokens, i, state);
		if (result === null) continue;
		state = result.state;
		if (result.skipNext) i++;
	}
	return state;
}

const identity = (raw: string): string => raw;
const yes = (): true => true;

const deckBuilderFlags: FlagTable<DeckBuilderOptions> = {
	"--name": createValueFlagHandler<DeckBuilderOptions, "name">("name", identity),
	"--interactive": createBooleanFlagHandler<DeckBuilderOptions, "interactive">(
		"interactive",
		yes,
	),
	"-h": createBooleanFlagHandler<DeckBuilderOptions, "help">("help", yes),
	"--help": createBooleanFlagHandler<DeckBuilderOptions, "help">("help", yes),
};

/**
 * Parses deck-builder arguments. Without `--name` the name stays absent.
 *
 * @param args - Tokens after the subcommand (or after the program name when run directly)
 *
 * @example
 * ```ts
 * parseDeckBuilderArgs(["--name", "Burn", "--interactive"]);
 * // { name: "Burn", interactive: true, help: false }
 * ```
 */
export function parseDeckBuilderArgs(
	args: readonly string[],
): DeckBuilderOptions {
	return runFlagTable(args, deckBuilderFlags, {
		interactive: false,
		help: false,
	});
}

const cardSearchFlags: FlagTable<CardSearchOptions> = {
	"--name": createValueFlagHandler<CardSearchOptions, "name">("name", identity),
	"--color": createValueFlagHandler<CardSearchOptions, "color">("color", identity),
	"--type": createValueFlagHandler<CardSearchOptions, "type">("type", identity),
	"--interactive": createBooleanFlagHandler<CardSearchOptions, "interactive">(
		"interactive",
		yes,
	),
	"-h": createBooleanFlagHandler<CardSearchOptions, "help">("help", yes),
	"--help": createBooleanFlagHandler<CardSearchOptions, "help">("help", yes),
};

/**
 * Parses card-search arguments. Filters that are not given stay absent.
 *
 * @example
 * ```ts
 * parseCardSearchArgs(["--color=Red", "--type", "Instant"]);
 * // { color: "Red", type: "Instant", interactive: false, help: false }
 * ```
 */
export function parseCardSearchArgs(
	args: readonly string[],
): CardSearchOptions {
	return runFlagTable(args, cardSearchFlags, {
		interactive: false,
		help: false,
	});
}
