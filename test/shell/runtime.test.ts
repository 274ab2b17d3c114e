// CHANGE: Add tests for log level selection
// WHY: MTG_LOG_LEVEL values map to effect log levels with Info as default
// REF: src/shell/runtime.ts
// SOURCE: n/a

import { Effect, FiberRef, LogLevel } from "effect";
import { describe, expect, it } from "vitest";

import { LOG_LEVEL_ENV, logLevelFrom, withCliLogging } from "../../src/shell/runtime.js";

describe("logLevelFrom", () => {
	it("maps known names case-insensitively", (): void => {
		expect(logLevelFrom("debug")).toBe(LogLevel.Debug);
		expect(logLevelFrom(" WARNING ")).toBe(LogLevel.Warning);
		expect(logLevelFrom("none")).toBe(LogLevel.None);
	});

	it("defaults to Info", (): void => {
		expect(logLevelFrom(undefined)).toBe(LogLevel.Info);
		expect(logLevelFrom("chatty")).toBe(LogLevel.Info);
	});
});

describe("withCliLogging", () => {
	it("installs the minimum level from the environment", () =>
		Effect.runPromise(
			Effect.gen(function* () {
				const level = yield* withCliLogging(
					FiberRef.get(FiberRef.currentMinimumLogLevel),
					{ [LOG_LEVEL_ENV]: "error" },
				);
				expect(level).toBe(LogLevel.Error);
			}),
		),
	);
});
