// CHANGE: Add unit tests for top-level argument parsing
// WHY: Every argv maps to help, version or a subcommand with its forwarded arguments
// REF: src/core/dispatch.ts
// SOURCE: n/a

import { describe, expect, it } from "vitest";

import { parseTopLevelArgs } from "../../src/core/dispatch.js";
import { helpBanner, versionLine } from "../../src/core/help.js";

describe("parseTopLevelArgs: help and version", () => {
	it("shows help without arguments", (): void => {
		expect(parseTopLevelArgs([])).toEqual({ kind: "help" });
	});

	it("recognises --version and help flags", (): void => {
		expect(parseTopLevelArgs(["--version"])).toEqual({ kind: "version" });
		expect(parseTopLevelArgs(["-h"])).toEqual({ kind: "help" });
		expect(parseTopLevelArgs(["--help", "deck-builder"])).toEqual({ kind: "help" });
	});

	it("falls through to help for unknown subcommands and garbage", (): void => {
		expect(parseTopLevelArgs(["frobnicate", "--name", "x"])).toEqual({ kind: "help" });
		expect(parseTopLevelArgs(["--what", "-x", ""])).toEqual({ kind: "help" });
	});
});

describe("parseTopLevelArgs: subcommands", () => {
	it("forwards the tokens after the subcommand", (): void => {
		expect(parseTopLevelArgs(["deck-builder", "--name", "Burn", "--interactive"])).toEqual({
			kind: "subcommand",
			name: "deck-builder",
			args: ["--name", "Burn", "--interactive"],
		});
	});

	it("forwards unknown leading flags ahead of the rest", (): void => {
		expect(parseTopLevelArgs(["--verbose", "card-search", "--color", "Red"])).toEqual({
			kind: "subcommand",
			name: "card-search",
			args: ["--verbose", "--color", "Red"],
		});
	});

	it("leaves --version after the subcommand to the subcommand", (): void => {
		expect(parseTopLevelArgs(["card-search", "--version"])).toEqual({
			kind: "subcommand",
			name: "card-search",
			args: ["--version"],
		});
	});

	it("skips empty tokens before the subcommand", (): void => {
		expect(parseTopLevelArgs(["", "deck-builder"])).toEqual({
			kind: "subcommand",
			name: "deck-builder",
			args: [],
		});
	});
});

describe("help texts", () => {
	it("lists both modules in the banner", (): void => {
		expect(helpBanner()).toEqual([
			"MTG Card App - An application for finding new MTG card combos",
			"",
			"Available modules:",
			"  - deck-builder: Build and manage MTG decks",
			"  - card-search: Search for MTG cards",
			"",
			"Run with -h for help or use a subcommand",
			"",
			"You can also run modules directly:",
			"  mtg-deck-builder",
			"  mtg-card-search",
		]);
	});

	it("reports the program version", (): void => {
		expect(versionLine()).toBe("mtg-card-app 0.1.0");
	});
});
