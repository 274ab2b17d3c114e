// CHANGE: Extract the read-eval-print loop shared by deck-builder and card-search
// WHY: Both interactive modes prompt, read, dispatch and release the input the same way
// REF: shell/io/lines.ts
// SOURCE: https://effect.website/docs/resource-management/introduction
// PURITY: APP (composes SHELL input/output with CORE command handling)
// EFFECT: Effect<void, never>
// INVARIANT: the line source is closed exactly once, whatever ends the loop

import { Console, Effect, Option } from "effect";

import { GOODBYE, PROMPT } from "../core/help.js";
import type { LineSource } from "../shell/io/lines.js";
import { printCommandError } from "../shell/output/printer.js";

export type LoopStep = "continue" | "stop";

export const CONTINUE: LoopStep = "continue";
export const STOP: LoopStep = "stop";

/**
 * Runs `handle` on every line until it answers STOP or the input ends.
 *
 * A defect raised by `handle` prints `Error: <message>` and the loop goes on.
 * End of input prints the farewell line.
 *
 * @param input - Opened line source; closing it is left to the caller
 * @param handle - Handler for one non-terminal line
 */
export function runPromptLoop(
	input: LineSource,
	handle: (line: string) => Effect.Effect<LoopStep>,
): Effect.Effect<void> {
	return Effect.gen(function* () {
		while (true) {
			yield* input.prompt(PROMPT);
			const line = yield* input.nextLine;
			if (Option.isNone(line)) {
				yield* Console.log(GOODBYE);
				return;
			}
			const step = yield* handle(line.value).pipe(
				Effect.catchAllDefect((defect) =>
					printCommandError(
						defect instanceof Error ? defect.message : String(defect),
					).pipe(Effect.as(CONTINUE)),
				),
			);
			if (step === STOP) return;
		}
	});
}

/**
 * Opens the context's input, runs the loop over it and releases it.
 */
export const withPromptLoop = (
	openInput: Effect.Effect<LineSource>,
	handle: (line: string) => Effect.Effect<LoopStep>,
): Effect.Effect<void> =>
	Effect.acquireUseRelease(
		openInput,
		(input) => runPromptLoop(input, handle),
		(input) => input.close,
	);
