// CHANGE: Shared documents and Either helpers for the test suites
// PURITY: CORE (test support only)

import { Either } from "effect";

import type { MatchError, SchemaError } from "../../src/core/errors.js";
import { formatDiagnostic } from "../../src/core/format/diagnostic.js";
import { matchArgv } from "../../src/core/match/engine.js";
import { compileSchema } from "../../src/core/schema/compiler.js";
import type { JSONObject, JSONValue } from "../../src/core/types/json.js";
import type { MatchOutcome } from "../../src/core/types/parse.js";
import type { Schema } from "../../src/core/types/schema.js";

/**
 * Two-value append option, single-value append option, required positional.
 */
export const DEMO_DOCUMENT: JSONObject = {
	name: "demo",
	executable: "/usr/bin/demo.sh",
	args: [
		{ arg1: { long: "arg1", arg_action: "append", number_of_values: 2 } },
		{ arg2: { long: "arg2", arg_action: "append" } },
		{ arg3: { required: true } },
	],
};

export const GREET_DOCUMENT: JSONObject = {
	name: "greet",
	about: "Say hello",
	version: "1.0.0",
	executable: "/bin/greet.sh",
	args: [
		{ name: { long: "name", short: "n", help: "Who to greet", required: true } },
		{ loud: { long: "loud", arg_action: "set_true" } },
		{ times: { short: "t", value_name: "N", default_value: "1" } },
		{ extra: { arg_action: "append", help: "Extra words" } },
	],
};

export const TOOL_DOCUMENT: JSONObject = {
	name: "tool",
	args: [{ verbose: { long: "verbose", short: "v", arg_action: "count" } }],
	subcommands: [
		{
			build: {
				about: "Build the project",
				executable: "/opt/tool/build.sh",
				args: [
					{ target: { required: true } },
					{ release: { long: "release", arg_action: "set_true" } },
				],
			},
		},
		{ clean: { executable: "/opt/tool/clean.sh" } },
	],
};

export function rightOf<A, E>(either: Either.Either<A, E>): A {
	if (Either.isLeft(either)) {
		throw new Error(`expected Right, got Left: ${JSON.stringify(either.left)}`);
	}
	return either.right;
}

export function leftOf<A, E>(either: Either.Either<A, E>): E {
	if (Either.isRight(either)) {
		throw new Error(`expected Left, got Right: ${JSON.stringify(either.right)}`);
	}
	return either.left;
}

export function compileOrThrow(document: JSONValue): Schema {
	const compiled = compileSchema(document);
	if (Either.isLeft(compiled)) throw new Error(formatDiagnostic(compiled.left));
	return compiled.right;
}

export const schemaErrorOf = (document: JSONValue): SchemaError =>
	leftOf(compileSchema(document));

export const matchDocument = (
	document: JSONValue,
	argv: ReadonlyArray<string>,
): Either.Either<MatchOutcome, MatchError> =>
	matchArgv(compileOrThrow(document), argv);
