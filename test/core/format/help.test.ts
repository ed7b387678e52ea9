// CHANGE: Specs for rendered help and version text
// PURITY: CORE
// INVARIANT: Column layout is stable for a given command path

import { describe, expect, it } from "vitest";

import { renderHelp, renderVersion } from "../../../src/core/format/help.js";
import { compileOrThrow, GREET_DOCUMENT, TOOL_DOCUMENT } from "../../support/fixtures.js";

describe("renderHelp", () => {
	it("lists positionals, options and built-ins with their notes", () => {
		const schema = compileOrThrow(GREET_DOCUMENT);
		expect(renderHelp([schema.root])).toBe(
			[
				"Say hello",
				"",
				"Usage: greet [OPTIONS] [<EXTRA>]...",
				"",
				"Arguments:",
				"  [<EXTRA>]...  Extra words [env: EXTRA]",
				"",
				"Options:",
				"  -n, --name <NAME>  Who to greet [required] [env: NAME]",
				"      --loud         [env: LOUD]",
				"  -t <N>             [default: 1] [env: TIMES]",
				"  -h, --help         Print help",
				"  -V, --version      Print version",
				"",
			].join("\n"),
		);
	});

	it("lists subcommands and marks a required one", () => {
		const schema = compileOrThrow(TOOL_DOCUMENT);
		expect(renderHelp([schema.root])).toBe(
			[
				"Usage: tool [OPTIONS] <COMMAND>",
				"",
				"Commands:",
				"  build  Build the project",
				"  clean",
				"",
				"Options:",
				"  -v, --verbose  [env: VERBOSE]",
				"  -h, --help     Print help",
				"",
			].join("\n"),
		);
	});

	it("names the whole path for a subcommand", () => {
		const schema = compileOrThrow(TOOL_DOCUMENT);
		const build = schema.root.subcommands[0];
		if (build === undefined) throw new Error("missing build subcommand");
		expect(renderHelp([schema.root, build])).toBe(
			[
				"Build the project",
				"",
				"Usage: tool build [OPTIONS] <TARGET>",
				"",
				"Arguments:",
				"  <TARGET>  [required] [env: TARGET]",
				"",
				"Options:",
				"      --release  [env: RELEASE]",
				"  -h, --help     Print help",
				"",
			].join("\n"),
		);
	});

	it("drops a built-in row when the command claims the spelling", () => {
		const schema = compileOrThrow({
			name: "h",
			executable: "/bin/h.sh",
			args: [{ help: { long: "help", arg_action: "set_true", help: "Custom help" } }],
		});
		expect(renderHelp([schema.root])).toBe(
			["Usage: h [OPTIONS]", "", "Options:", "      --help  Custom help [env: HELP]", ""].join("\n"),
		);
	});

	it("returns nothing for an empty path", () => {
		expect(renderHelp([])).toBe("");
	});
});

describe("renderVersion", () => {
	it("prints name and version on one line", () => {
		expect(renderVersion(compileOrThrow(GREET_DOCUMENT).root)).toBe("greet 1.0.0\n");
	});
});
