// CHANGE: Lexical scanner for argv; no schema lookups
// PURITY: CORE (cursor mutation stays local to one matching run)
// INVARIANT: Once a Terminator has been produced every later token is Positional
// COMPLEXITY: O(1) per token

import type { Token } from "../types/token.js";

export const TERMINATOR = "--";

/**
 * Classifies one raw argument.
 *
 * Priority order: after terminator → Positional; `--` → Terminator;
 * `--name[=value]` → LongOption; `-x` (one non-dash character) → ShortOption;
 * anything else → Positional.
 *
 * @pure true
 * @example
 * ```ts
 * classify("--out=dist", false);
 * // { kind: "LongOption", raw: "--out=dist", name: "out", inlineValue: "dist" }
 * classify("-abc", false);
 * // { kind: "Positional", raw: "-abc" }
 * ```
 */
export function classify(raw: string, terminatorSeen: boolean): Token {
	if (terminatorSeen) return { kind: "Positional", raw };
	if (raw === TERMINATOR) return { kind: "Terminator", raw };
	if (raw.startsWith("--")) {
		const body = raw.slice(2);
		const eq = body.indexOf("=");
		return eq === -1
			? { kind: "LongOption", raw, name: body, inlineValue: undefined }
			: {
					kind: "LongOption",
					raw,
					name: body.slice(0, eq),
					inlineValue: body.slice(eq + 1),
				};
	}
	const chars = Array.from(raw);
	const second = chars[1];
	if (chars.length === 2 && chars[0] === "-" && second !== undefined && second !== "-") {
		return { kind: "ShortOption", raw, name: second };
	}
	return { kind: "Positional", raw };
}

/**
 * Single-pass cursor over argv used by the matching engine.
 *
 * `next()` classifies lazily; `takeRaw()` hands out the following tokens
 * verbatim, so a value that looks like an option (or `--`) never changes
 * scanner state.
 */
export class TokenCursor {
	private index = 0;
	private terminator = false;

	constructor(private readonly argv: ReadonlyArray<string>) {}

	get position(): number {
		return this.index;
	}

	get terminatorSeen(): boolean {
		return this.terminator;
	}

	remaining(): number {
		return this.argv.length - this.index;
	}

	next(): Token | undefined {
		const raw = this.argv[this.index];
		if (raw === undefined) return undefined;
		this.index += 1;
		const token = classify(raw, this.terminator);
		if (token.kind === "Terminator") this.terminator = true;
		return token;
	}

	/**
	 * Takes up to `count` raw tokens; the result is shorter only at end of input.
	 */
	takeRaw(count: number): ReadonlyArray<string> {
		const taken = this.argv.slice(this.index, this.index + count);
		this.index += taken.length;
		return taken;
	}
}

/**
 * Lazy, finite token sequence. Iterating again restarts from the first argument.
 */
export class TokenSequence implements Iterable<Token> {
	constructor(readonly argv: ReadonlyArray<string>) {}

	cursor(): TokenCursor {
		return new TokenCursor(this.argv);
	}

	*[Symbol.iterator](): Iterator<Token> {
		const cursor = this.cursor();
		for (let token = cursor.next(); token !== undefined; token = cursor.next()) {
			yield token;
		}
	}
}

/**
 * @param argv - arguments without the program name
 */
export const scan = (argv: ReadonlyArray<string>): TokenSequence =>
	new TokenSequence(argv);
