// CHANGE: Central export file for core type definitions
// PURITY: Re-exports only

export type { JSONObject, JSONValue } from "./json.js";
export {
	describeJSONKind,
	isBoolean,
	isJSONArray,
	isJSONObject,
	isNonNegativeInteger,
	isString,
} from "./json.js";
export type {
	Bindings,
	MatchedLevel,
	MatchOutcome,
	ParseState,
} from "./parse.js";
export type {
	ArgAction,
	ArgumentSpec,
	CommandSpec,
	Schema,
} from "./schema.js";
export {
	isPositional,
	isPresenceAction,
	isUnbounded,
	PRESENCE_ACTIONS,
} from "./schema.js";
export type { Token, TokenKind } from "./token.js";
