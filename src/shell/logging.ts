// CHANGE: stderr logger so stdout stays with the target executable
// PURITY: SHELL
// INVARIANT: Nothing below the configured minimum level is written

import { Effect, Logger, type LogLevel } from "effect";

export const stderrLogger = Logger.make(({ date, logLevel, message }) => {
	const parts: ReadonlyArray<string> = Array.isArray(message)
		? message.map(String)
		: [String(message)];
	globalThis.console.error(
		`argbind ${date.toISOString()} ${logLevel.label} ${parts.join(" ")}`,
	);
});

export const LoggingLive = Logger.replace(Logger.defaultLogger, stderrLogger);

/**
 * Runs `effect` with the stderr logger at the given minimum level.
 */
export const withLogging =
	(level: LogLevel.LogLevel) =>
	<A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
		effect.pipe(Logger.withMinimumLogLevel(level), Effect.provide(LoggingLive));
