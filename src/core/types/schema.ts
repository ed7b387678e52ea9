// CHANGE: Compiled argument grammar (Schema Model)
// PURITY: CORE
// INVARIANT: Instances are only produced by compileSchema and never mutated
// COMPLEXITY: O(1)

/**
 * Accumulation policy applied when an argument is matched.
 *
 * - `Set`: last occurrence wins
 * - `Append`: every occurrence's values accumulate in arrival order
 * - `Count`: occurrences are counted, nothing consumed
 * - `SetTrue` / `SetFalse`: presence only, idempotent
 */
export type ArgAction = "Set" | "Append" | "Count" | "SetTrue" | "SetFalse";

/**
 * Actions that never consume value tokens.
 */
export const PRESENCE_ACTIONS: ReadonlySet<ArgAction> = new Set<ArgAction>([
	"Count",
	"SetTrue",
	"SetFalse",
]);

export const isPresenceAction = (action: ArgAction): boolean =>
	PRESENCE_ACTIONS.has(action);

/**
 * One declared argument.
 *
 * @remarks
 * - @invariant long === undefined ∧ short === undefined ⇔ positional
 * - @invariant numberOfValues = 0 ⇔ isPresenceAction(action)
 */
export interface ArgumentSpec {
	readonly key: string;
	readonly long: string | undefined;
	readonly short: string | undefined;
	readonly valueName: string | undefined;
	readonly help: string | undefined;
	readonly required: boolean;
	readonly action: ArgAction;
	readonly numberOfValues: number;
	readonly defaultValue: string | undefined;
	/** Resolved environment variable name (override or transliterated key). */
	readonly envName: string;
}

export const isPositional = (spec: ArgumentSpec): boolean =>
	spec.long === undefined && spec.short === undefined;

/**
 * A positional with `Append` absorbs every remaining positional token.
 */
export const isUnbounded = (spec: ArgumentSpec): boolean =>
	isPositional(spec) && spec.action === "Append";

/**
 * One command level: the root program or a subcommand.
 *
 * @invariant subcommands.length = 0 → executable !== undefined
 */
export interface CommandSpec {
	readonly name: string;
	readonly about: string | undefined;
	readonly version: string | undefined;
	readonly executable: string | undefined;
	readonly args: ReadonlyArray<ArgumentSpec>;
	readonly subcommands: ReadonlyArray<CommandSpec>;
}

export interface Schema {
	readonly root: CommandSpec;
	/** Joins multi-value bindings; never escaped inside values. */
	readonly valueSeparator: string;
}
