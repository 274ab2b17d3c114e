// CHANGE: Line-oriented input for the interactive prompts
// WHY: The loops depend on LineSource; readline is one implementation over injectable streams
// REF: app/promptLoop.ts
// SOURCE: https://nodejs.org/api/readline.html
// PURITY: SHELL (reads the input stream, writes the prompt to the output stream)
// INVARIANT: nextLine yields None exactly once the input has ended or been closed

import * as readline from "node:readline";

import { Effect, Option } from "effect";

/**
 * Source of prompt lines. The interactive loops depend only on this interface,
 * so tests drive them with an in-memory implementation.
 */
export interface LineSource {
	readonly prompt: (text: string) => Effect.Effect<void>;
	readonly nextLine: Effect.Effect<Option.Option<string>>;
	readonly close: Effect.Effect<void>;
}

/**
 * Streams a readline line source attaches to.
 *
 * @invariant terminal = true only for an interactive TTY input
 */
export interface LineStreams {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
	readonly terminal: boolean;
}

export const processStreams = (): LineStreams => ({
	input: process.stdin,
	output: process.stdout,
	terminal: process.stdin.isTTY === true,
});

/**
 * Opens a readline interface over the given streams (stdin/stdout by default).
 *
 * Ctrl-C closes the interface, which the loops observe as end of input.
 *
 * @pure false (attaches to the streams)
 */
export function readlineLineSource(streams: LineStreams = processStreams()): LineSource {
	const rl = readline.createInterface({
		input: streams.input,
		output: streams.output,
		terminal: streams.terminal,
	});
	rl.on("SIGINT", () => {
		streams.output.write("\n");
		rl.close();
	});
	const lines = rl[Symbol.asyncIterator]();

	return {
		prompt: (text) =>
			Effect.sync(() => {
				rl.setPrompt(text);
				rl.prompt();
			}),
		nextLine: Effect.promise(() => lines.next()).pipe(
			Effect.map((result) =>
				result.done === true ? Option.none() : Option.some(result.value),
			),
		),
		close: Effect.sync(() => {
			rl.close();
		}),
	};
}
