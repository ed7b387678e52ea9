// CHANGE: Typed error ADT for schema compilation, matching and the shell boundary
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; core functions return them, never throw
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * The configuration document is malformed or self-contradictory.
 *
 * @invariant rule.length > 0
 * @remarks key is "<document>" when the violation is not tied to one argument
 */
export class SchemaError extends Data.TaggedError("SchemaError")<{
	readonly key: string;
	readonly rule: string;
	readonly detail: string;
}> {}

/**
 * A `--long` or `-s` token that names no argument of the current command.
 */
export class UnknownArgument extends Data.TaggedError("UnknownArgument")<{
	readonly token: string;
}> {}

/**
 * Fewer value tokens remained than one occurrence needs.
 *
 * @invariant 0 < shortfall ≤ expected
 */
export class MissingValue extends Data.TaggedError("MissingValue")<{
	readonly key: string;
	readonly flag: string;
	readonly expected: number;
	readonly shortfall: number;
}> {}

/**
 * A positional token with no unsaturated positional argument left.
 */
export class UnexpectedArgument extends Data.TaggedError("UnexpectedArgument")<{
	readonly token: string;
}> {}

export class MissingRequired extends Data.TaggedError("MissingRequired")<{
	readonly key: string;
	readonly flag: string;
}> {}

/**
 * `--flag=value` given to an option that takes no value.
 */
export class UnexpectedValue extends Data.TaggedError("UnexpectedValue")<{
	readonly flag: string;
	readonly value: string;
}> {}

/**
 * A command level without executable was left without choosing a subcommand.
 */
export class MissingSubcommand extends Data.TaggedError("MissingSubcommand")<{
	readonly command: string;
	readonly available: ReadonlyArray<string>;
}> {}

export type MatchError =
	| UnknownArgument
	| MissingValue
	| UnexpectedArgument
	| MissingRequired
	| UnexpectedValue
	| MissingSubcommand;

/**
 * Reading or parsing the JSON document failed.
 */
export class DocumentError extends Data.TaggedError("DocumentError")<{
	readonly source: string;
	readonly detail: string;
}> {}

/**
 * argbind's own flags are missing or conflict.
 */
export class CliUsageError extends Data.TaggedError("CliUsageError")<{
	readonly detail: string;
}> {}

/**
 * The target executable could not be started.
 */
export class HandoffError extends Data.TaggedError("HandoffError")<{
	readonly executable: string;
	readonly detail: string;
}> {}

/**
 * Union of every failure the application can end with.
 *
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| SchemaError
	| MatchError
	| DocumentError
	| CliUsageError
	| HandoffError;
