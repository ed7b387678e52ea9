// CHANGE: Merge the split document form (parser description + run description)
// PURITY: CORE
// INVARIANT: Entry order follows the parser document; run-only entries are appended in their own order
// COMPLEXITY: O(n · m) where n, m = entries per list (lists are short)

import { Either } from "effect";

import { SchemaError } from "../errors.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	type JSONValue,
} from "../types/json.js";
import { DOCUMENT_KEY } from "./compiler.js";

/** Lists of single-key objects that merge entry by entry. */
const KEYED_LISTS: ReadonlySet<string> = new Set(["args", "subcommands"]);

const entryName = (item: JSONValue): string | undefined => {
	if (!isJSONObject(item)) return undefined;
	const keys = Object.keys(item);
	return keys.length === 1 ? keys[0] : undefined;
};

function mergeKeyedList(
	base: ReadonlyArray<JSONValue>,
	overlay: ReadonlyArray<JSONValue>,
): ReadonlyArray<JSONValue> {
	const overlayByName = new Map<string, JSONValue>();
	for (const item of overlay) {
		const name = entryName(item);
		if (name !== undefined && isJSONObject(item)) {
			const body = item[name];
			if (body !== undefined) overlayByName.set(name, body);
		}
	}
	const merged = base.map((item): JSONValue => {
		const name = entryName(item);
		if (name === undefined || !isJSONObject(item)) return item;
		const extra = overlayByName.get(name);
		const body = item[name];
		if (extra === undefined || body === undefined) return item;
		return { [name]: mergeValues(body, extra) };
	});
	const baseNames = new Set(base.map(entryName));
	return [...merged, ...overlay.filter((item) => !baseNames.has(entryName(item)))];
}

function mergeValues(base: JSONValue, overlay: JSONValue): JSONValue {
	if (!isJSONObject(base) || !isJSONObject(overlay)) return overlay;
	const result = new Map<string, JSONValue>(Object.entries(base));
	for (const [field, value] of Object.entries(overlay)) {
		const current = result.get(field);
		result.set(
			field,
			current !== undefined &&
				KEYED_LISTS.has(field) &&
				isJSONArray(current) &&
				isJSONArray(value)
				? mergeKeyedList(current, value)
				: current === undefined
					? value
					: mergeValues(current, value),
		);
	}
	// fromEntries defines own keys, so "__proto__" stays a plain (unknown) field
	return Object.fromEntries(result);
}

/**
 * The run document may spell `subcommands` as a map (`{ "build": {...} }`);
 * rewrites it, at every level, into the ordered single-key list form.
 */
function normalizeRunCommand(value: JSONValue): JSONValue {
	if (!isJSONObject(value) || !Object.hasOwn(value, "subcommands")) return value;
	const subcommands = value["subcommands"];
	const entries =
		subcommands !== undefined && isJSONObject(subcommands)
			? Object.entries(subcommands).map(
					([name, body]): JSONValue => ({ [name]: normalizeRunCommand(body) }),
				)
			: subcommands !== undefined && isJSONArray(subcommands)
				? subcommands.map((item): JSONValue => {
						const name = entryName(item);
						const body = name !== undefined && isJSONObject(item) ? item[name] : undefined;
						return name === undefined || body === undefined
							? item
							: { [name]: normalizeRunCommand(body) };
					})
				: subcommands;
	if (entries === undefined) return value;
	const fields = new Map<string, JSONValue>(Object.entries(value));
	fields.set("subcommands", entries);
	return Object.fromEntries(fields);
}

/**
 * Merges the parser document with the run document. Fields of the run
 * document win; `args` and `subcommands` merge entry by entry on their key.
 * The run document may give `subcommands` as a name → settings map.
 *
 * @pure true
 * @example
 * ```ts
 * mergeDocuments(
 *   { name: "t", args: [{ out: { long: "out" } }] },
 *   { executable: "/bin/t.sh", args: [{ out: { env_var: "OUTPUT" } }] },
 * );
 * // Right({ name: "t", args: [{ out: { long: "out", env_var: "OUTPUT" } }], executable: "/bin/t.sh" })
 * ```
 */
export function mergeDocuments(
	parser: JSONValue,
	run: JSONValue,
): Either.Either<JSONObject, SchemaError> {
	if (!isJSONObject(parser) || !isJSONObject(run)) {
		return Either.left(
			new SchemaError({
				key: DOCUMENT_KEY,
				rule: "document-shape",
				detail: "both documents of the split form must be objects",
			}),
		);
	}
	const merged = mergeValues(parser, normalizeRunCommand(run));
	return isJSONObject(merged)
		? Either.right(merged)
		: Either.left(
				new SchemaError({
					key: DOCUMENT_KEY,
					rule: "document-shape",
					detail: "merged document is not an object",
				}),
			);
}
