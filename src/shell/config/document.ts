// CHANGE: Load the JSON argument document from an inline string or a file
// PURITY: SHELL (file system reads)
// EFFECT: Effect<JSONValue, DocumentError | SchemaError>
// INVARIANT: The raw document never leaves this module unparsed

import * as fs from "node:fs";

import { Effect } from "effect";
import { match } from "ts-pattern";

import { DocumentError, type SchemaError } from "../../core/errors.js";
import { mergeDocuments } from "../../core/schema/merge.js";
import type { JSONValue } from "../../core/types/json.js";

export type DocumentSource =
	| { readonly _tag: "Inline"; readonly flag: string; readonly text: string }
	| { readonly _tag: "File"; readonly flag: string; readonly path: string };

export type DocumentPlan =
	| { readonly _tag: "Combined"; readonly source: DocumentSource }
	| {
			readonly _tag: "Split";
			readonly parser: DocumentSource;
			readonly run: DocumentSource;
	  };

const describeSource = (source: DocumentSource): string =>
	match(source)
		.with({ _tag: "Inline" }, ({ flag }) => flag)
		.with({ _tag: "File" }, ({ flag, path }) => `${flag} ${path}`)
		.exhaustive();

/**
 * Parses JSON text into a JSONValue.
 *
 * @pure true (failure modelled as a value)
 */
export function parseDocumentText(
	text: string,
	label: string,
): Effect.Effect<JSONValue, DocumentError> {
	return Effect.try({
		try: (): JSONValue => JSON.parse(text),
		catch: (error) =>
			new DocumentError({
				source: label,
				detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}

function readSourceText(
	source: DocumentSource,
): Effect.Effect<string, DocumentError> {
	return match(source)
		.with({ _tag: "Inline" }, ({ text }) => Effect.succeed(text))
		.with({ _tag: "File" }, ({ path }) =>
			Effect.tryPromise({
				try: () => fs.promises.readFile(path, "utf8"),
				catch: (error) =>
					new DocumentError({
						source: describeSource(source),
						detail: error instanceof Error ? error.message : String(error),
					}),
			}),
		)
		.exhaustive();
}

export function readDocumentSource(
	source: DocumentSource,
): Effect.Effect<JSONValue, DocumentError> {
	return readSourceText(source).pipe(
		Effect.tap((text) =>
			Effect.logDebug(`read ${text.length} characters from ${describeSource(source)}`),
		),
		Effect.flatMap((text) => parseDocumentText(text, describeSource(source))),
	);
}

/**
 * Loads the document described by the plan; the split form is merged.
 */
export function loadDocument(
	plan: DocumentPlan,
): Effect.Effect<JSONValue, DocumentError | SchemaError> {
	return match(plan)
		.with({ _tag: "Combined" }, ({ source }) => readDocumentSource(source))
		.with({ _tag: "Split" }, ({ parser, run }) =>
			Effect.gen(function* () {
				const [parserDoc, runDoc] = yield* Effect.all([
					readDocumentSource(parser),
					readDocumentSource(run),
				]);
				const merged: JSONValue = yield* mergeDocuments(parserDoc, runDoc);
				return merged;
			}),
		)
		.exhaustive();
}
