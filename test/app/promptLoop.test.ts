// CHANGE: Add unit tests for the shared prompt loop
// WHY: STOP, end of input and handler defects must each end or continue the loop as documented
// REF: src/app/promptLoop.ts
// SOURCE: n/a

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { CONTINUE, runPromptLoop, STOP, withPromptLoop } from "../../src/app/promptLoop.js";
import { captureConsole } from "../utils/console.js";
import { scriptedInput } from "../utils/lines.js";

describe("runPromptLoop", () => {
	it("stops as soon as the handler answers STOP", () =>
		Effect.runPromise(
			Effect.gen(function* () {
				captureConsole();
				const input = scriptedInput(["a", "stop", "b"]);
				const seen: string[] = [];
				yield* runPromptLoop(input, (line) =>
					Effect.sync(() => {
						seen.push(line);
						return line === "stop" ? STOP : CONTINUE;
					}),
				);
				expect(seen).toEqual(["a", "stop"]);
				expect(input.closeCount()).toBe(0);
			}),
		),
	);

	it("reports a handler defect and keeps reading", () =>
		Effect.runPromise(
			Effect.gen(function* () {
				const out = captureConsole();
				const input = scriptedInput(["bad", "good"]);
				yield* runPromptLoop(input, (line) =>
					line === "bad"
						? Effect.die(new Error("card index unavailable"))
						: Effect.succeed(CONTINUE),
				);
				expect(out.stdout()).toEqual([
					"Error: card index unavailable",
					"Goodbye!",
				]);
			}),
		),
	);
});

describe("withPromptLoop", () => {
	it("closes the input exactly once", () =>
		Effect.runPromise(
			Effect.gen(function* () {
				captureConsole();
				const input = scriptedInput(["x"]);
				yield* withPromptLoop(Effect.succeed(input), () => Effect.succeed(STOP));
				expect(input.closeCount()).toBe(1);
			}),
		),
	);
});
