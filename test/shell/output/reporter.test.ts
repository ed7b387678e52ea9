// CHANGE: Specs for console output of help text and diagnostics
// PURITY: SHELL (console spied)

import { Effect } from "effect";
import { describe, expect, it, vi } from "vitest";

import { CliUsageError, UnknownArgument } from "../../../src/core/errors.js";
import { HELP_HINT, printText, reportError } from "../../../src/shell/output/reporter.js";

describe("printText", () => {
	it("writes rendered text to stdout without doubling the final newline", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		Effect.runSync(printText("greet 1.0.0\n"));
		expect(log).toHaveBeenCalledWith("greet 1.0.0");
	});
});

describe("reportError", () => {
	it("adds the help hint to command-line errors", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		Effect.runSync(reportError(new UnknownArgument({ token: "--nope" })));
		expect(error.mock.calls).toEqual([["error: unknown option '--nope'"], [`\n${HELP_HINT}`]]);
	});

	it("prints other failures on one line", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		Effect.runSync(reportError(new CliUsageError({ detail: "provide --json" })));
		expect(error.mock.calls).toEqual([["error: provide --json"]]);
	});
});
