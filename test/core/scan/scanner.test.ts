// CHANGE: Specs for argv classification and the token cursor
// FORMAT THEOREM: ∀raw: classify(raw, true).kind = "Positional"
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { classify, scan, TokenCursor } from "../../../src/core/scan/scanner.js";

describe("classify", () => {
	it("splits long options at the first equals sign", () => {
		expect(classify("--out=dist", false)).toEqual({
			kind: "LongOption",
			raw: "--out=dist",
			name: "out",
			inlineValue: "dist",
		});
		expect(classify("--a=b=c", false)).toEqual({
			kind: "LongOption",
			raw: "--a=b=c",
			name: "a",
			inlineValue: "b=c",
		});
	});

	it("keeps an empty inline value distinct from none", () => {
		expect(classify("--out=", false)).toMatchObject({ inlineValue: "" });
		expect(classify("--out", false)).toMatchObject({ inlineValue: undefined });
	});

	it("recognises a dash plus exactly one non-dash character as a short option", () => {
		expect(classify("-v", false)).toEqual({ kind: "ShortOption", raw: "-v", name: "v" });
		expect(classify("-1", false)).toEqual({ kind: "ShortOption", raw: "-1", name: "1" });
	});

	it("treats clusters, a lone dash and the empty string as positionals", () => {
		expect(classify("-abc", false).kind).toBe("Positional");
		expect(classify("-", false).kind).toBe("Positional");
		expect(classify("", false).kind).toBe("Positional");
	});

	it("recognises the terminator only before it was seen", () => {
		expect(classify("--", false)).toEqual({ kind: "Terminator", raw: "--" });
		expect(classify("--", true)).toEqual({ kind: "Positional", raw: "--" });
	});

	it("classifies everything after the terminator as positional", () => {
		fc.assert(
			fc.property(fc.string(), (raw) => {
				expect(classify(raw, true)).toEqual({ kind: "Positional", raw });
			}),
		);
	});
});

describe("TokenSequence", () => {
	it("switches to positionals after the first terminator", () => {
		const kinds = [...scan(["a", "--", "-v", "--"])].map((token) => token.kind);
		expect(kinds).toEqual(["Positional", "Terminator", "Positional", "Positional"]);
	});

	it("restarts from the first argument on every iteration", () => {
		const sequence = scan(["--x", "-y", "z"]);
		expect([...sequence]).toEqual([...sequence]);
		expect([...sequence]).toHaveLength(3);
	});
});

describe("TokenCursor", () => {
	it("hands out raw values without touching terminator state", () => {
		const cursor = new TokenCursor(["--x", "--", "y"]);
		expect(cursor.next()?.kind).toBe("LongOption");
		expect(cursor.takeRaw(1)).toEqual(["--"]);
		expect(cursor.terminatorSeen).toBe(false);
		expect(cursor.next()).toEqual({ kind: "Positional", raw: "y" });
		expect(cursor.remaining()).toBe(0);
		expect(cursor.next()).toBeUndefined();
	});

	it("returns a short slice at end of input", () => {
		const cursor = new TokenCursor(["a"]);
		expect(cursor.takeRaw(3)).toEqual(["a"]);
		expect(cursor.position).toBe(1);
		expect(cursor.takeRaw(2)).toEqual([]);
	});
});
