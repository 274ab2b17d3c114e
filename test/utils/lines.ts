// CHANGE: Add in-memory LineSource for interactive tests
// WHY: Prompt loops are driven without a terminal
// REF: src/shell/io/lines.ts
// SOURCE: n/a

import { Effect, Option } from "effect";

import type { RunContext } from "../../src/app/context.js";
import type { LineSource } from "../../src/shell/io/lines.js";

/**
 * Line source that replays `lines`, then reports end of input.
 *
 * Invariants:
 * - prompts records every prompt text, in order
 * - closeCount counts how often close ran
 */
export interface ScriptedInput extends LineSource {
	readonly prompts: readonly string[];
	readonly closeCount: () => number;
	readonly consumed: () => number;
}

export function scriptedInput(lines: readonly string[]): ScriptedInput {
	const prompts: string[] = [];
	let position = 0;
	let closes = 0;
	return {
		prompts,
		closeCount: () => closes,
		consumed: () => position,
		prompt: (text) =>
			Effect.sync(() => {
				prompts.push(text);
			}),
		nextLine: Effect.sync(() => {
			const line = lines.at(position);
			if (line === undefined) return Option.none();
			position++;
			return Option.some(line);
		}),
		close: Effect.sync(() => {
			closes++;
		}),
	};
}

/**
 * Run context rooted at `cwd` whose interactive input is `input`.
 */
export const scriptedContext = (
	cwd: string,
	input: LineSource = scriptedInput([]),
): RunContext => ({
	cwd,
	openInput: Effect.succeed(input),
});
