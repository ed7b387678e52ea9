// CHANGE: Derive environment bindings from matched parse states
// PURITY: CORE
// INVARIANT: Total over well-formed states; output ordered by environment name
// COMPLEXITY: O(a log a) where a = declared arguments along the matched path

import { pipe } from "effect";
import { match } from "ts-pattern";

import type { Bindings, MatchedLevel, ParseState } from "../types/parse.js";
import type { ArgumentSpec, Schema } from "../types/schema.js";

/** Payload of a matched `SetTrue` argument. */
export const TRUE_SENTINEL = "true";
/** Payload of a matched `SetFalse` argument. */
export const FALSE_SENTINEL = "false";

/**
 * Payload for one argument, or undefined when the binding is omitted.
 *
 * @pure true
 * @invariant unset ∧ defaultValue === undefined → undefined
 */
export function bindingValue(
	spec: ArgumentSpec,
	state: ParseState,
	separator: string,
): string | undefined {
	if (!state.seen.has(spec.key)) return spec.defaultValue;
	return match(spec.action)
		.with("Count", () => String(state.counts.get(spec.key) ?? 0))
		.with("SetTrue", () => TRUE_SENTINEL)
		.with("SetFalse", () => FALSE_SENTINEL)
		.with("Set", "Append", () => (state.values.get(spec.key) ?? []).join(separator))
		.exhaustive();
}

const byName = (
	[a]: readonly [string, string],
	[b]: readonly [string, string],
): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Builds the immutable binding map for every level of a matched command path.
 *
 * @pure true
 * @precondition env names are unique along the path (enforced by compileSchema)
 *
 * @example
 * ```ts
 * // arg1: append ×2 values, given "--arg1 a b --arg1 d e"
 * formatBindings(schema, outcome.path).get("ARG1"); // "a,b,d,e"
 * ```
 */
export function formatBindings(
	schema: Schema,
	path: ReadonlyArray<MatchedLevel>,
): Bindings {
	return pipe(
		path.flatMap(({ command, state }) =>
			command.args.flatMap((spec): ReadonlyArray<readonly [string, string]> => {
				const value = bindingValue(spec, state, schema.valueSeparator);
				return value === undefined ? [] : [[spec.envName, value]];
			}),
		),
		(entries) => [...entries].sort(byName),
		(sorted) => new Map(sorted),
	);
}

/**
 * Returns a copy of `bindings` with one extra entry, keeping name order.
 *
 * @pure true
 */
export function withBinding(
	bindings: Bindings,
	name: string,
	value: string,
): Bindings {
	return new Map([...bindings, [name, value] as const].sort(byName));
}
