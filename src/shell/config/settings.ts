// CHANGE: Environment-driven settings read through effect's Config
// PURITY: SHELL (reads the active ConfigProvider, process.env by default)
// EFFECT: Effect<Settings, CliUsageError>
// INVARIANT: selfVar is a valid environment variable name

import { Config, Effect, LogLevel } from "effect";

import { CliUsageError } from "../../core/errors.js";
import { isValidEnvName } from "../../core/schema/env-name.js";

export interface Settings {
	/** Minimum level written by the stderr logger. */
	readonly logLevel: LogLevel.LogLevel;
	/** Variable that carries argbind's own path when --add-self-to-env is given. */
	readonly selfVar: string;
}

export const DEFAULT_SELF_VAR = "ARGBIND_SELF";

export const SettingsConfig: Config.Config<Settings> = Config.all({
	logLevel: Config.logLevel("ARGBIND_LOG_LEVEL").pipe(
		Config.withDefault(LogLevel.Warning),
	),
	selfVar: Config.string("ARGBIND_SELF_VAR").pipe(
		Config.withDefault(DEFAULT_SELF_VAR),
	),
});

export const loadSettings: Effect.Effect<Settings, CliUsageError> = Effect.gen(
	function* () {
		return yield* SettingsConfig;
	},
).pipe(
	Effect.mapError(
		(error) =>
			new CliUsageError({
				detail: `invalid environment configuration: ${String(error)}`,
			}),
	),
	Effect.filterOrFail(
		(settings) => isValidEnvName(settings.selfVar),
		(settings) =>
			new CliUsageError({
				detail: `ARGBIND_SELF_VAR "${settings.selfVar}" is not a valid environment variable name`,
			}),
	),
);
