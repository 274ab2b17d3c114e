// CHANGE: Add tests for the readline-backed line source
// WHY: The interactive loops treat Option.none() as end of input; the mapping from readline must hold for EOF, close and Ctrl-C
// REF: src/shell/io/lines.ts
// SOURCE: n/a

import { PassThrough, Readable, Writable } from "node:stream";

import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";

import { readlineLineSource } from "../../../src/shell/io/lines.js";

/**
 * Output stream that records everything written to it, synchronously.
 */
const recordingOutput = (): { readonly stream: Writable; readonly written: () => string } => {
	const chunks: string[] = [];
	const stream = new Writable({
		write(chunk: Buffer, _encoding, callback): void {
			chunks.push(chunk.toString("utf8"));
			callback();
		},
	});
	return { stream, written: () => chunks.join("") };
};

describe("readlineLineSource", () => {
	it("yields each line, then none once the input ends", () => {
		const output = recordingOutput();
		const source = readlineLineSource({
			input: Readable.from(["add Island 2\nlist\n"]),
			output: output.stream,
			terminal: false,
		});
		return Effect.runPromise(
			Effect.gen(function* () {
				yield* source.prompt("> ");
				const first = yield* source.nextLine;
				const second = yield* source.nextLine;
				const end = yield* source.nextLine;
				expect(first).toEqual(Option.some("add Island 2"));
				expect(second).toEqual(Option.some("list"));
				expect(Option.isNone(end)).toBe(true);
				expect(output.written()).toBe("> ");
			}),
		);
	});

	it("ends the input when closed", () => {
		const output = recordingOutput();
		const source = readlineLineSource({
			input: new PassThrough(),
			output: output.stream,
			terminal: false,
		});
		return Effect.runPromise(
			Effect.gen(function* () {
				yield* source.close;
				const line = yield* source.nextLine;
				expect(Option.isNone(line)).toBe(true);
			}),
		);
	});

	it("treats Ctrl-C as end of input and moves to a new line", () => {
		const input = new PassThrough();
		const output = recordingOutput();
		const source = readlineLineSource({ input, output: output.stream, terminal: true });
		return Effect.runPromise(
			Effect.gen(function* () {
				input.write("\u0003");
				const line = yield* source.nextLine;
				expect(Option.isNone(line)).toBe(true);
				expect(output.written()).toBe("\n");
			}),
		);
	});
});
