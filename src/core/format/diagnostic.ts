// CHANGE: One-line diagnostics for every failure variant
// PURITY: CORE
// INVARIANT: Every message names the offending key, token or source

import { match } from "ts-pattern";

import type { AppError, MatchError } from "../errors.js";

const MATCH_TAGS: ReadonlySet<string> = new Set<MatchError["_tag"]>([
	"UnknownArgument",
	"MissingValue",
	"UnexpectedArgument",
	"MissingRequired",
	"UnexpectedValue",
	"MissingSubcommand",
]);

export const isMatchError = (error: AppError): error is MatchError =>
	MATCH_TAGS.has(error._tag);

const plural = (n: number, word: string): string =>
	n === 1 ? `${n} ${word}` : `${n} ${word}s`;

/**
 * @pure true
 * @example
 * ```ts
 * formatDiagnostic(new MissingRequired({ key: "arg3", flag: "<ARG3>" }));
 * // "error: the required argument '<ARG3>' (arg3) was not provided"
 * ```
 */
export function formatDiagnostic(error: AppError): string {
	const body = match(error)
		.with(
			{ _tag: "SchemaError" },
			(e) => `invalid argument schema at "${e.key}" (${e.rule}): ${e.detail}`,
		)
		.with({ _tag: "UnknownArgument" }, (e) => `unknown option '${e.token}'`)
		.with(
			{ _tag: "MissingValue" },
			(e) =>
				`'${e.flag}' (${e.key}) takes ${plural(e.expected, "value")} but ${plural(e.shortfall, "value")} ${e.shortfall === 1 ? "is" : "are"} missing`,
		)
		.with({ _tag: "UnexpectedArgument" }, (e) => `unexpected argument '${e.token}'`)
		.with(
			{ _tag: "MissingRequired" },
			(e) => `the required argument '${e.flag}' (${e.key}) was not provided`,
		)
		.with(
			{ _tag: "UnexpectedValue" },
			(e) => `'${e.flag}' takes no value but '${e.value}' was given`,
		)
		.with(
			{ _tag: "MissingSubcommand" },
			(e) => `'${e.command}' requires a subcommand: ${e.available.join(", ")}`,
		)
		.with({ _tag: "DocumentError" }, (e) => `cannot load ${e.source}: ${e.detail}`)
		.with({ _tag: "CliUsageError" }, (e) => e.detail)
		.with(
			{ _tag: "HandoffError" },
			(e) => `cannot run ${e.executable}: ${e.detail}`,
		)
		.exhaustive();
	return `error: ${body}`;
}
