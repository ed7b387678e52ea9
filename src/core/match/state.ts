// CHANGE: ParseState accumulator and action semantics
// PURITY: CORE (mutation does not leave a single matching run)
// INVARIANT: Append preserves arrival order across occurrences; Set keeps only the last occurrence
// COMPLEXITY: O(v) per occurrence where v = number of values

import { match } from "ts-pattern";

import type { ParseState } from "../types/parse.js";
import type { ArgumentSpec } from "../types/schema.js";

export interface StateBuilder {
	readonly values: Map<string, ReadonlyArray<string>>;
	readonly counts: Map<string, number>;
	readonly seen: Set<string>;
}

export const createStateBuilder = (): StateBuilder => ({
	values: new Map(),
	counts: new Map(),
	seen: new Set(),
});

/**
 * Records one occurrence of `spec` carrying `values`.
 *
 * @precondition values.length === spec.numberOfValues
 */
export function applyOccurrence(
	builder: StateBuilder,
	spec: ArgumentSpec,
	values: ReadonlyArray<string>,
): void {
	match(spec.action)
		.with("Set", () => {
			builder.values.set(spec.key, [...values]);
		})
		.with("Append", () => {
			builder.values.set(spec.key, [
				...(builder.values.get(spec.key) ?? []),
				...values,
			]);
		})
		.with("Count", () => {
			builder.counts.set(spec.key, (builder.counts.get(spec.key) ?? 0) + 1);
		})
		.with("SetTrue", "SetFalse", () => undefined)
		.exhaustive();
	builder.seen.add(spec.key);
}

export function freezeState(
	builder: StateBuilder,
	cursor: number,
	terminatorSeen: boolean,
): ParseState {
	return {
		values: new Map(builder.values),
		counts: new Map(builder.counts),
		seen: new Set(builder.seen),
		cursor,
		terminatorSeen,
	};
}

/**
 * How an argument is written in diagnostics: `--long`, `-s` or `<NAME>`.
 */
export function displayName(spec: ArgumentSpec): string {
	if (spec.long !== undefined) return `--${spec.long}`;
	if (spec.short !== undefined) return `-${spec.short}`;
	return `<${placeholder(spec)}>`;
}

/**
 * Value label used in usage text and diagnostics.
 */
export const placeholder = (spec: ArgumentSpec): string =>
	spec.valueName ?? spec.key.toUpperCase();
