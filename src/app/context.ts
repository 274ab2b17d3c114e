// CHANGE: Introduce RunContext passed explicitly to every subcommand
// WHY: Subcommands receive cwd and input as values instead of reading process-wide state
// REF: main.ts
// SOURCE: n/a
// PURITY: APP

import { Effect } from "effect";

import { type LineSource, readlineLineSource } from "../shell/io/lines.js";

/**
 * Everything a subcommand reads from its environment besides its arguments.
 *
 * @invariant openInput is only run by interactive mode
 */
export interface RunContext {
	/** Directory searched for mtg-card-app.config.json and relative catalog paths. */
	readonly cwd: string;
	readonly openInput: Effect.Effect<LineSource>;
}

/**
 * Context bound to the current process: its working directory and stdin.
 */
export const processRunContext = (): RunContext => ({
	cwd: process.cwd(),
	openInput: Effect.sync(() => readlineLineSource()),
});
