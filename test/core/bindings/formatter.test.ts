// CHANGE: Specs for binding payloads and map ordering
// PURITY: CORE
// INVARIANT: Binding maps iterate in ascending name order

import { describe, expect, it } from "vitest";

import {
	bindingValue,
	FALSE_SENTINEL,
	formatBindings,
	TRUE_SENTINEL,
	withBinding,
} from "../../../src/core/bindings/formatter.js";
import { matchArgv } from "../../../src/core/match/engine.js";
import { compileArgument } from "../../../src/core/schema/compiler.js";
import type { ParseState } from "../../../src/core/types/parse.js";
import { compileOrThrow, rightOf } from "../../support/fixtures.js";

const state = (overrides: Partial<ParseState>): ParseState => ({
	values: new Map(),
	counts: new Map(),
	seen: new Set(),
	cursor: 0,
	terminatorSeen: false,
	...overrides,
});

describe("bindingValue", () => {
	const words = rightOf(compileArgument("words", { long: "word", arg_action: "append" }));
	const mode = rightOf(compileArgument("mode", { long: "mode", default_value: "fast" }));
	const quiet = rightOf(compileArgument("quiet", { long: "quiet", arg_action: "count" }));
	const off = rightOf(compileArgument("off", { long: "off", arg_action: "set_false" }));
	const on = rightOf(compileArgument("on", { long: "on", arg_action: "set_true" }));

	it("joins values with the separator without escaping", () => {
		const matched = state({ values: new Map([["words", ["a,b", "c"]]]), seen: new Set(["words"]) });
		expect(bindingValue(words, matched, ",")).toBe("a,b,c");
		expect(bindingValue(words, matched, ";")).toBe("a,b;c");
	});

	it("falls back to the default or omits unset arguments", () => {
		expect(bindingValue(mode, state({}), ",")).toBe("fast");
		expect(bindingValue(words, state({}), ",")).toBeUndefined();
	});

	it("binds counts in decimal and presence sentinels", () => {
		expect(
			bindingValue(quiet, state({ counts: new Map([["quiet", 12]]), seen: new Set(["quiet"]) }), ","),
		).toBe("12");
		expect(bindingValue(off, state({ seen: new Set(["off"]) }), ",")).toBe(FALSE_SENTINEL);
		expect(bindingValue(on, state({ seen: new Set(["on"]) }), ",")).toBe(TRUE_SENTINEL);
	});
});

describe("formatBindings", () => {
	it("uses the document's value separator", () => {
		const schema = compileOrThrow({
			name: "sep",
			executable: "/bin/sep.sh",
			value_separator: ":",
			args: [{ path: { long: "path", arg_action: "append" } }],
		});
		const outcome = rightOf(matchArgv(schema, ["--path", "/a", "--path", "/b"]));
		if (outcome._tag !== "Matched") throw new Error("expected Matched");
		expect(formatBindings(schema, outcome.path).get("PATH")).toBe("/a:/b");
	});

	it("orders bindings by environment name, not by declaration", () => {
		const schema = compileOrThrow({
			name: "order",
			executable: "/bin/order.sh",
			args: [
				{ zeta: { long: "zeta" } },
				{ alpha: { long: "alpha" } },
				{ mid: { long: "mid", env_var: "B_MID" } },
			],
		});
		const outcome = rightOf(
			matchArgv(schema, ["--zeta", "1", "--alpha", "2", "--mid", "3"]),
		);
		if (outcome._tag !== "Matched") throw new Error("expected Matched");
		expect([...formatBindings(schema, outcome.path).keys()]).toEqual(["ALPHA", "B_MID", "ZETA"]);
	});
});

describe("withBinding", () => {
	it("inserts in name order", () => {
		const bindings = withBinding(new Map([["A", "1"], ["C", "3"]]), "B", "2");
		expect([...bindings]).toEqual([["A", "1"], ["B", "2"], ["C", "3"]]);
	});

	it("replaces an existing binding of the same name", () => {
		const bindings = withBinding(new Map([["SELF", "old"]]), "SELF", "new");
		expect([...bindings]).toEqual([["SELF", "new"]]);
	});
});
