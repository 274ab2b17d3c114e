// CHANGE: Process boundary: log level selection and the single process.exit of each binary
// WHY: APP returns ExitCode; only the binaries terminate the process
// REF: bin/mtg-card-app.ts
// SOURCE: https://effect.website/docs/observability/logging
// PURITY: SHELL
// INVARIANT: process.exit is called exactly once per run, with the program's ExitCode or 1 on a defect

import { Console, Effect, Logger, LogLevel } from "effect";

import { type ExitCode, FAILURE } from "../core/models.js";

export const LOG_LEVEL_ENV = "MTG_LOG_LEVEL";

const LOG_LEVELS: Readonly<Record<string, LogLevel.LogLevel>> = {
	debug: LogLevel.Debug,
	info: LogLevel.Info,
	warning: LogLevel.Warning,
	error: LogLevel.Error,
	none: LogLevel.None,
};

/**
 * Maps an MTG_LOG_LEVEL value to a log level; unknown or absent values mean Info.
 *
 * @pure true
 */
export const logLevelFrom = (value: string | undefined): LogLevel.LogLevel =>
	LOG_LEVELS[(value ?? "").trim().toLowerCase()] ?? LogLevel.Info;

/**
 * Diagnostics go to stderr so they never interleave with command output on stdout.
 */
const stderrLogger = Logger.replace(
	Logger.defaultLogger,
	Logger.withConsoleError(Logger.logfmtLogger),
);

/**
 * Applies the stderr logger and the minimum level taken from the environment.
 */
export const withCliLogging = <A, E>(
	program: Effect.Effect<A, E>,
	env: NodeJS.ProcessEnv = process.env,
): Effect.Effect<A, E> =>
	program.pipe(
		Logger.withMinimumLogLevel(logLevelFrom(env[LOG_LEVEL_ENV])),
		Effect.provide(stderrLogger),
	);

/**
 * Runs a CLI program and exits the process with its code.
 *
 * @pure false (terminates the process)
 */
export function runCli(program: Effect.Effect<ExitCode>): void {
	const guarded = withCliLogging(program).pipe(
		Effect.catchAllDefect((defect) =>
			Console.error("Fatal error:", defect).pipe(Effect.as(FAILURE)),
		),
		Effect.flatMap((code) =>
			Effect.sync(() => {
				process.exit(code);
			}),
		),
	);
	Effect.runFork(guarded);
}
