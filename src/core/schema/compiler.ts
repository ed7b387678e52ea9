// CHANGE: Compile the loosely-typed JSON document into a validated Schema
// PURITY: CORE
// INVARIANT: Either a fully valid Schema or the first SchemaError; never a partial schema
// COMPLEXITY: O(n) where n = number of declared arguments and commands

import { Either } from "effect";

import { SchemaError } from "../errors.js";
import {
	describeJSONKind,
	isBoolean,
	isJSONArray,
	isJSONObject,
	isNonNegativeInteger,
	isString,
	type JSONObject,
	type JSONValue,
	ownField,
} from "../types/json.js";
import {
	type ArgAction,
	type ArgumentSpec,
	type CommandSpec,
	isPositional,
	isPresenceAction,
	isUnbounded,
	type Schema,
} from "../types/schema.js";
import { isValidEnvName, toEnvName } from "./env-name.js";

/** Key reported when a violation is not tied to a single argument. */
export const DOCUMENT_KEY = "<document>";

export const DEFAULT_VALUE_SEPARATOR = ",";

const ACTIONS: ReadonlyMap<string, ArgAction> = new Map<string, ArgAction>([
	["set", "Set"],
	["append", "Append"],
	["count", "Count"],
	["set_true", "SetTrue"],
	["set_false", "SetFalse"],
	["flag", "SetTrue"],
]);

const ARGUMENT_FIELDS: ReadonlySet<string> = new Set([
	"long",
	"short",
	"value_name",
	"help",
	"required",
	"arg_action",
	"number_of_values",
	"env_var",
	"default_value",
]);

const SUBCOMMAND_FIELDS: ReadonlySet<string> = new Set([
	"about",
	"version",
	"executable",
	"args",
	"subcommands",
]);

const ROOT_FIELDS: ReadonlySet<string> = new Set([
	...SUBCOMMAND_FIELDS,
	"name",
	"value_separator",
]);

type Compiled<A> = Either.Either<A, SchemaError>;

const fail = (key: string, rule: string, detail: string): Compiled<never> =>
	Either.left(new SchemaError({ key, rule, detail }));

function checkKnownFields(
	obj: JSONObject,
	allowed: ReadonlySet<string>,
	key: string,
): Compiled<void> {
	const unknown = Object.keys(obj).find((field) => !allowed.has(field));
	return unknown === undefined
		? Either.right(undefined)
		: fail(key, "unknown-field", `unknown field "${unknown}"`);
}

function optionalString(
	obj: JSONObject,
	field: string,
	key: string,
): Compiled<string | undefined> {
	const value = ownField(obj, field);
	if (value === undefined) return Either.right(undefined);
	return isString(value)
		? Either.right(value)
		: fail(key, "field-type", `"${field}" must be a string, got ${describeJSONKind(value)}`);
}

/**
 * Splits an ordered list of single-key objects (`[{ "name": {...} }, …]`).
 */
function singleKeyEntries(
	list: JSONValue | undefined,
	field: string,
	owner: string,
): Compiled<ReadonlyArray<readonly [string, JSONObject]>> {
	return Either.gen(function* () {
		if (list === undefined) return [];
		if (!isJSONArray(list)) {
			return yield* fail(owner, "field-type", `"${field}" must be an array`);
		}
		const entries: Array<readonly [string, JSONObject]> = [];
		for (const [index, item] of list.entries()) {
			const keys = isJSONObject(item) ? Object.keys(item) : [];
			const name = keys[0];
			const body = isJSONObject(item) && name !== undefined ? ownField(item, name) : undefined;
			if (keys.length !== 1 || name === undefined || body === undefined) {
				return yield* fail(
					owner,
					"document-shape",
					`"${field}[${index}]" must be an object with exactly one key`,
				);
			}
			if (!isJSONObject(body)) {
				return yield* fail(name, "document-shape", `settings of "${name}" must be an object`);
			}
			entries.push([name, body]);
		}
		return entries;
	});
}

function readAction(obj: JSONObject, key: string): Compiled<ArgAction> {
	const raw = ownField(obj, "arg_action");
	if (raw === undefined) return Either.right<ArgAction>("Set");
	if (!isString(raw)) {
		return fail(key, "field-type", `"arg_action" must be a string, got ${describeJSONKind(raw)}`);
	}
	const action = ACTIONS.get(raw.toLowerCase());
	return action === undefined
		? fail(key, "action", `unknown arg_action "${raw}" (expected one of ${[...ACTIONS.keys()].join(", ")})`)
		: Either.right(action);
}

function readArity(obj: JSONObject, key: string, action: ArgAction): Compiled<number> {
	const raw = ownField(obj, "number_of_values");
	const presence = isPresenceAction(action);
	if (raw === undefined) return Either.right(presence ? 0 : 1);
	if (!isNonNegativeInteger(raw)) {
		return fail(key, "arity", `"number_of_values" must be a non-negative integer`);
	}
	if (presence && raw !== 0) {
		return fail(key, "action-arity", `action ${action} takes no values but number_of_values is ${raw}`);
	}
	if (!presence && raw === 0) {
		return fail(key, "action-arity", `action ${action} needs number_of_values ≥ 1`);
	}
	return Either.right(raw);
}

function readSpellings(
	obj: JSONObject,
	key: string,
): Compiled<{ readonly long: string | undefined; readonly short: string | undefined }> {
	return Either.gen(function* () {
		const long = yield* optionalString(obj, "long", key);
		const short = yield* optionalString(obj, "short", key);
		if (long !== undefined && (long.length === 0 || long.startsWith("-") || long.includes("="))) {
			return yield* fail(key, "long-spelling", `"long" must be non-empty without leading "-" or "="`);
		}
		if (short !== undefined && (Array.from(short).length !== 1 || short === "-")) {
			return yield* fail(key, "short-spelling", `"short" must be exactly one non-dash character`);
		}
		return { long, short };
	});
}

/**
 * Compiles one `{ key: { …fields } }` entry.
 *
 * @pure true
 */
export function compileArgument(key: string, obj: JSONObject): Compiled<ArgumentSpec> {
	return Either.gen(function* () {
		if (key.length === 0) {
			return yield* fail(key, "document-shape", "argument key must be non-empty");
		}
		yield* checkKnownFields(obj, ARGUMENT_FIELDS, key);
		const { long, short } = yield* readSpellings(obj, key);
		const valueName = yield* optionalString(obj, "value_name", key);
		const help = yield* optionalString(obj, "help", key);
		const envVar = yield* optionalString(obj, "env_var", key);
		const defaultValue = yield* optionalString(obj, "default_value", key);
		const rawRequired = ownField(obj, "required");
		if (rawRequired !== undefined && !isBoolean(rawRequired)) {
			return yield* fail(key, "field-type", `"required" must be a boolean`);
		}
		const required = rawRequired ?? false;
		const action = yield* readAction(obj, key);
		const numberOfValues = yield* readArity(obj, key, action);

		if (envVar !== undefined && !isValidEnvName(envVar)) {
			return yield* fail(key, "env-name", `"env_var" ${envVar} is not a valid environment variable name`);
		}
		if (defaultValue !== undefined && isPresenceAction(action)) {
			return yield* fail(key, "default-value", `action ${action} cannot carry a default_value`);
		}
		if (defaultValue !== undefined && required) {
			return yield* fail(key, "required-default", "a required argument cannot have a default_value");
		}
		if (long === undefined && short === undefined && isPresenceAction(action)) {
			return yield* fail(key, "positional-action", `positional arguments need a value-bearing action, got ${action}`);
		}

		return {
			key,
			long,
			short,
			valueName,
			help,
			required,
			action,
			numberOfValues,
			defaultValue,
			envName: envVar ?? toEnvName(key),
		};
	});
}

function checkUniqueness(args: ReadonlyArray<ArgumentSpec>): Compiled<void> {
	return Either.gen(function* () {
		const keys = new Set<string>();
		const longs = new Set<string>();
		const shorts = new Set<string>();
		for (const arg of args) {
			if (keys.has(arg.key)) {
				return yield* fail(arg.key, "duplicate-key", `argument "${arg.key}" is declared twice`);
			}
			keys.add(arg.key);
			if (arg.long !== undefined) {
				if (longs.has(arg.long)) {
					return yield* fail(arg.key, "duplicate-long", `--${arg.long} is already used`);
				}
				longs.add(arg.long);
			}
			if (arg.short !== undefined) {
				if (shorts.has(arg.short)) {
					return yield* fail(arg.key, "duplicate-short", `-${arg.short} is already used`);
				}
				shorts.add(arg.short);
			}
		}
	});
}

/**
 * Positional ordering: the unbounded positional is unique and last, and no
 * required positional follows an optional one.
 */
function checkPositionalOrder(args: ReadonlyArray<ArgumentSpec>): Compiled<void> {
	return Either.gen(function* () {
		const positionals = args.filter(isPositional);
		let sawOptional = false;
		for (const [index, arg] of positionals.entries()) {
			if (isUnbounded(arg) && index !== positionals.length - 1) {
				return yield* fail(arg.key, "unbounded-positional", "an unbounded positional must be the last positional");
			}
			if (arg.required && sawOptional) {
				return yield* fail(arg.key, "positional-order", "a required positional cannot follow an optional one");
			}
			sawOptional = sawOptional || !arg.required;
		}
	});
}

/**
 * Environment names must stay injective along a root-to-leaf path.
 */
function checkEnvNames(
	args: ReadonlyArray<ArgumentSpec>,
	inherited: ReadonlyMap<string, string>,
): Compiled<ReadonlyMap<string, string>> {
	return Either.gen(function* () {
		const owners = new Map(inherited);
		for (const arg of args) {
			const owner = owners.get(arg.envName);
			if (owner !== undefined) {
				return yield* fail(arg.key, "env-collision", `environment name ${arg.envName} is also bound by "${owner}"`);
			}
			owners.set(arg.envName, arg.key);
		}
		return owners;
	});
}

function compileCommand(
	name: string,
	obj: JSONObject,
	inheritedEnv: ReadonlyMap<string, string>,
	allowedFields: ReadonlySet<string>,
): Compiled<CommandSpec> {
	return Either.gen(function* () {
		yield* checkKnownFields(obj, allowedFields, name);
		const about = yield* optionalString(obj, "about", name);
		const version = yield* optionalString(obj, "version", name);
		const executable = yield* optionalString(obj, "executable", name);
		if (executable !== undefined && executable.length === 0) {
			return yield* fail(name, "missing-executable", "executable must be a non-empty path");
		}

		const args: ArgumentSpec[] = [];
		for (const [key, body] of yield* singleKeyEntries(ownField(obj, "args"), "args", name)) {
			args.push(yield* compileArgument(key, body));
		}
		yield* checkUniqueness(args);
		yield* checkPositionalOrder(args);
		const envOwners = yield* checkEnvNames(args, inheritedEnv);

		const subcommands: CommandSpec[] = [];
		const seen = new Set<string>();
		for (const [subName, body] of yield* singleKeyEntries(ownField(obj, "subcommands"), "subcommands", name)) {
			if (subName.length === 0 || subName.startsWith("-")) {
				return yield* fail(subName, "subcommand-name", "subcommand names must be non-empty and not start with \"-\"");
			}
			if (seen.has(subName)) {
				return yield* fail(subName, "duplicate-subcommand", `subcommand "${subName}" is declared twice in "${name}"`);
			}
			seen.add(subName);
			subcommands.push(yield* compileCommand(subName, body, envOwners, SUBCOMMAND_FIELDS));
		}

		if (subcommands.length === 0 && executable === undefined) {
			return yield* fail(name, "missing-executable", `command "${name}" has no executable and no subcommands`);
		}
		return { name, about, version, executable, args, subcommands };
	});
}

/**
 * Compiles a raw configuration document into a validated Schema.
 *
 * @pure true
 * @invariant Right(schema) → every ArgumentSpec satisfies the action/arity,
 * uniqueness, positional-ordering and env-name invariants
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const result = compileSchema({
 *   name: "greet",
 *   executable: "/usr/local/bin/greet.sh",
 *   args: [{ name: { long: "name", required: true } }],
 * });
 * // Either.isRight(result) === true
 * ```
 */
export function compileSchema(document: JSONValue): Compiled<Schema> {
	return Either.gen(function* () {
		if (!isJSONObject(document)) {
			return yield* fail(DOCUMENT_KEY, "document-shape", `document must be an object, got ${describeJSONKind(document)}`);
		}
		const name = yield* optionalString(document, "name", DOCUMENT_KEY);
		if (name === undefined || name.length === 0) {
			return yield* fail(DOCUMENT_KEY, "missing-name", `"name" is required`);
		}
		const separator = yield* optionalString(document, "value_separator", DOCUMENT_KEY);
		if (separator !== undefined && Array.from(separator).length !== 1) {
			return yield* fail(DOCUMENT_KEY, "value-separator", `"value_separator" must be exactly one character`);
		}
		const root = yield* compileCommand(name, document, new Map(), ROOT_FIELDS);
		return { root, valueSeparator: separator ?? DEFAULT_VALUE_SEPARATOR };
	});
}
