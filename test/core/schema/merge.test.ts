// CHANGE: Specs for merging the split document form
// PURITY: CORE
// INVARIANT: Run fields win; keyed lists merge entry by entry

import { describe, expect, it } from "vitest";

import { mergeDocuments } from "../../../src/core/schema/merge.js";
import type { JSONValue } from "../../../src/core/types/json.js";
import { leftOf, rightOf, schemaErrorOf } from "../../support/fixtures.js";

describe("mergeDocuments", () => {
	it("merges argument entries by key and adds run-only fields", () => {
		const merged = rightOf(
			mergeDocuments(
				{ name: "t", args: [{ out: { long: "out" } }] },
				{ executable: "/bin/t.sh", args: [{ out: { env_var: "OUTPUT" } }] },
			),
		);
		expect(merged).toEqual({
			name: "t",
			args: [{ out: { long: "out", env_var: "OUTPUT" } }],
			executable: "/bin/t.sh",
		});
	});

	it("appends run-only entries after the parser entries", () => {
		const merged = rightOf(
			mergeDocuments(
				{ name: "t", args: [{ a: { long: "a" } }] },
				{ args: [{ b: { long: "b" } }] },
			),
		);
		expect(merged["args"]).toEqual([{ a: { long: "a" } }, { b: { long: "b" } }]);
	});

	it("merges subcommands recursively", () => {
		const merged = rightOf(
			mergeDocuments(
				{ name: "t", subcommands: [{ build: { args: [{ x: { long: "x" } }] } }] },
				{ subcommands: [{ build: { executable: "/bin/build.sh" } }] },
			),
		);
		expect(merged).toEqual({
			name: "t",
			subcommands: [
				{ build: { args: [{ x: { long: "x" } }], executable: "/bin/build.sh" } },
			],
		});
	});

	it("accepts run subcommands written as a name map", () => {
		const merged = rightOf(
			mergeDocuments(
				{ name: "t", subcommands: [{ build: { args: [{ x: { long: "x" } }] } }] },
				{
					subcommands: {
						build: { executable: "/bin/build.sh", args: [{ x: { env_var: "X_OUT" } }] },
						clean: { executable: "/bin/clean.sh" },
					},
				},
			),
		);
		expect(merged["subcommands"]).toEqual([
			{
				build: {
					args: [{ x: { long: "x", env_var: "X_OUT" } }],
					executable: "/bin/build.sh",
				},
			},
			{ clean: { executable: "/bin/clean.sh" } },
		]);
	});

	it("normalizes name maps on nested run subcommands", () => {
		const merged = rightOf(
			mergeDocuments(
				{ name: "t", subcommands: [{ db: { subcommands: [{ up: {} }] } }] },
				{ subcommands: { db: { subcommands: { up: { executable: "/bin/up.sh" } } } } },
			),
		);
		expect(merged["subcommands"]).toEqual([
			{ db: { subcommands: [{ up: { executable: "/bin/up.sh" } }] } },
		]);
	});

	it("keeps a parsed __proto__ key as an own field", () => {
		const run: JSONValue = JSON.parse(
			'{"__proto__":{"executable":"/bin/sneaky","bogus":1}}',
		);
		const merged = rightOf(mergeDocuments({ name: "p", args: [] }, run));
		expect(Object.keys(merged)).toEqual(["name", "args", "__proto__"]);
		expect(Object.hasOwn(merged, "executable")).toBe(false);
		const error = schemaErrorOf(merged);
		expect([error.key, error.rule, error.detail]).toEqual([
			"p",
			"unknown-field",
			'unknown field "__proto__"',
		]);
	});

	it("lets scalar run fields override parser fields", () => {
		expect(rightOf(mergeDocuments({ name: "a" }, { name: "b" }))).toEqual({ name: "b" });
	});

	it("rejects halves that are not objects", () => {
		const error = leftOf(mergeDocuments([], { name: "t" }));
		expect([error.key, error.rule]).toEqual(["<document>", "document-shape"]);
	});
});
