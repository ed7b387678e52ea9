// CHANGE: Specs for environment-driven settings
// PURITY: SHELL (ConfigProvider replaced per test)

import { ConfigProvider, Effect, Either, LogLevel } from "effect";
import { describe, expect, it } from "vitest";

import { DEFAULT_SELF_VAR, loadSettings } from "../../../src/shell/config/settings.js";
import { leftOf, rightOf } from "../../support/fixtures.js";

const loadWith = (entries: ReadonlyArray<readonly [string, string]>) =>
	Effect.runSync(
		Effect.either(
			loadSettings.pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))),
		),
	);

describe("loadSettings", () => {
	it("defaults to warnings and ARGBIND_SELF", () => {
		expect(rightOf(loadWith([]))).toEqual({
			logLevel: LogLevel.Warning,
			selfVar: DEFAULT_SELF_VAR,
		});
	});

	it("reads the log level and self variable from the environment", () => {
		const settings = rightOf(
			loadWith([
				["ARGBIND_LOG_LEVEL", "Debug"],
				["ARGBIND_SELF_VAR", "SCRIPT_RUNNER"],
			]),
		);
		expect(settings.logLevel).toBe(LogLevel.Debug);
		expect(settings.selfVar).toBe("SCRIPT_RUNNER");
	});

	it("rejects a self variable that is not a valid environment name", () => {
		const error = leftOf(loadWith([["ARGBIND_SELF_VAR", "2SELF"]]));
		expect(error).toMatchObject({
			_tag: "CliUsageError",
			detail: 'ARGBIND_SELF_VAR "2SELF" is not a valid environment variable name',
		});
	});

	it("rejects an unknown log level", () => {
		const result = loadWith([["ARGBIND_LOG_LEVEL", "LOUD"]]);
		expect(Either.isLeft(result)).toBe(true);
		expect(leftOf(result).detail.startsWith("invalid environment configuration: ")).toBe(true);
	});
});
