// CHANGE: Results of matching argv against a compiled schema
// PURITY: CORE
// INVARIANT: States handed out of the engine are read-only snapshots

import type { CommandSpec } from "./schema.js";

/**
 * Accumulated values for one command level.
 *
 * @remarks
 * - values holds a list per key so `Append` and multi-value `Set` share one shape
 * - seen ⊇ keys(values) ∪ keys(counts)
 */
export interface ParseState {
	readonly values: ReadonlyMap<string, ReadonlyArray<string>>;
	readonly counts: ReadonlyMap<string, number>;
	readonly seen: ReadonlySet<string>;
	/** Index of the next unread argv token. */
	readonly cursor: number;
	readonly terminatorSeen: boolean;
}

/**
 * One matched command level and its state.
 */
export interface MatchedLevel {
	readonly command: CommandSpec;
	readonly state: ParseState;
}

export type MatchOutcome =
	| {
			readonly _tag: "Matched";
			/** Root first, leaf last; never empty. */
			readonly path: ReadonlyArray<MatchedLevel>;
			readonly executable: string;
	  }
	| {
			readonly _tag: "HelpRequested";
			readonly path: ReadonlyArray<CommandSpec>;
	  }
	| {
			readonly _tag: "VersionRequested";
			readonly command: CommandSpec;
	  };

/**
 * Environment variable name → payload, ordered by name.
 */
export type Bindings = ReadonlyMap<string, string>;
