// CHANGE: argbind's own command line, parsed by the same compiler and engine it offers scripts
// PURITY: SHELL (boundary between process argv and the core)
// EFFECT: Effect<SelfCommand, CliUsageError | SchemaError | MatchError>
// INVARIANT: Exactly one document plan is produced; conflicting or missing sources fail

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import {
	CliUsageError,
	type MatchError,
	type SchemaError,
} from "../../core/errors.js";
import { renderHelp, renderVersion } from "../../core/format/help.js";
import { matchArgv } from "../../core/match/engine.js";
import { compileSchema } from "../../core/schema/compiler.js";
import type { JSONObject } from "../../core/types/json.js";
import type { ParseState } from "../../core/types/parse.js";
import type { DocumentPlan, DocumentSource } from "./document.js";

export const VERSION = "0.1.0";

/**
 * argbind's own interface, in the same document format scripts use.
 * The executable is required by the format but is never launched.
 */
export const SELF_DOCUMENT: JSONObject = {
	name: "argbind",
	about:
		"Parse a script's arguments against a JSON schema and run it with the values bound as environment variables",
	version: VERSION,
	executable: "argbind",
	args: [
		{ json: { long: "json", value_name: "JSON", help: "Combined schema and run document" } },
		{ json_file: { long: "json-file", value_name: "FILE", help: "Read the combined document from FILE" } },
		{ clap_json: { long: "clap-json", value_name: "JSON", help: "Parser half of the split form" } },
		{ clap_json_file: { long: "clap-json-file", value_name: "FILE", help: "Read the parser half from FILE" } },
		{ run_json: { long: "run-json", value_name: "JSON", help: "Run half of the split form (executable, env_var overrides)" } },
		{ run_json_file: { long: "run-json-file", value_name: "FILE", help: "Read the run half from FILE" } },
		{
			add_self_to_env: {
				long: "add-self-to-env",
				arg_action: "set_true",
				help: "Expose argbind's own path to the target executable",
			},
		},
		{
			trailing: {
				arg_action: "append",
				value_name: "ARGS",
				help: "Arguments for the target, after a literal --",
			},
		},
	],
};

export type SelfCommand =
	| {
			readonly _tag: "Run";
			readonly plan: DocumentPlan;
			readonly addSelfToEnv: boolean;
			readonly trailing: ReadonlyArray<string>;
	  }
	| { readonly _tag: "Print"; readonly text: string };

type SourcePair = readonly [inline: string, file: string];

const first = (state: ParseState, key: string): string | undefined =>
	state.values.get(key)?.[0];

/**
 * Reads one `--x` / `--x-file` pair; both present is a conflict.
 */
function sourceOf(
	state: ParseState,
	[inlineKey, fileKey]: SourcePair,
	flag: string,
): Either.Either<DocumentSource | undefined, CliUsageError> {
	const text = first(state, inlineKey);
	const path = first(state, fileKey);
	if (text !== undefined && path !== undefined) {
		return Either.left(
			new CliUsageError({ detail: `--${flag} cannot be used with --${flag}-file` }),
		);
	}
	if (text !== undefined) {
		return Either.right<DocumentSource>({ _tag: "Inline", flag: `--${flag}`, text });
	}
	if (path !== undefined) {
		return Either.right<DocumentSource>({ _tag: "File", flag: `--${flag}-file`, path });
	}
	return Either.right(undefined);
}

/**
 * Chooses between the combined and the split document form.
 *
 * @pure true
 */
export function resolvePlan(state: ParseState): Either.Either<DocumentPlan, CliUsageError> {
	return Either.gen(function* () {
		const combined = yield* sourceOf(state, ["json", "json_file"], "json");
		const parser = yield* sourceOf(state, ["clap_json", "clap_json_file"], "clap-json");
		const run = yield* sourceOf(state, ["run_json", "run_json_file"], "run-json");
		const split = parser !== undefined || run !== undefined;

		if (combined !== undefined && split) {
			return yield* Either.left(
				new CliUsageError({ detail: "--json cannot be combined with --clap-json/--run-json" }),
			);
		}
		if (combined !== undefined) return { _tag: "Combined", source: combined } as const;
		if (parser !== undefined && run !== undefined) {
			return { _tag: "Split", parser, run } as const;
		}
		return yield* Either.left(
			new CliUsageError({
				detail: split
					? "the split form needs both --clap-json[-file] and --run-json[-file]"
					: "provide --json or --json-file (or --clap-json* together with --run-json*)",
			}),
		);
	});
}

/**
 * Parses argbind's own arguments (program name excluded).
 *
 * @example
 * ```ts
 * parseSelfArgs(["--json", "{…}", "--", "--name", "x"]);
 * // Effect succeeding with { _tag: "Run", trailing: ["--name", "x"], … }
 * ```
 */
export function parseSelfArgs(
	argv: ReadonlyArray<string>,
): Effect.Effect<SelfCommand, CliUsageError | SchemaError | MatchError> {
	return Effect.gen(function* () {
		const schema = yield* compileSchema(SELF_DOCUMENT);
		const outcome = yield* matchArgv(schema, argv);
		const selected: Either.Either<SelfCommand, CliUsageError> = match(outcome)
			.with({ _tag: "HelpRequested" }, ({ path }) =>
				Either.right<SelfCommand>({ _tag: "Print", text: renderHelp(path) }),
			)
			.with({ _tag: "VersionRequested" }, ({ command }) =>
				Either.right<SelfCommand>({ _tag: "Print", text: renderVersion(command) }),
			)
			.with({ _tag: "Matched" }, ({ path }): Either.Either<SelfCommand, CliUsageError> => {
				const level = path[0];
				if (level === undefined) {
					return Either.left(new CliUsageError({ detail: "no arguments were matched" }));
				}
				const { state } = level;
				return resolvePlan(state).pipe(
					Either.map((plan): SelfCommand => ({
						_tag: "Run",
						plan,
						addSelfToEnv: state.seen.has("add_self_to_env"),
						trailing: state.values.get("trailing") ?? [],
					})),
				);
			})
			.exhaustive();
		return yield* selected;
	});
}
