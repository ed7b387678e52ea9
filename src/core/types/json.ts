// CHANGE: JSON value model shared by the schema compiler and document loading
// PURITY: CORE
// INVARIANT: Guards never throw; they only narrow
// COMPLEXITY: O(1) per guard

/**
 * Any value JSON.parse can produce.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

export function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isJSONArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

/**
 * Reads a field only when the object owns it; inherited names such as
 * `constructor` or a `__proto__` prototype never leak through.
 *
 * @pure true
 */
export function ownField(obj: JSONObject, field: string): JSONValue | undefined {
	return Object.hasOwn(obj, field) ? obj[field] : undefined;
}

export function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

export function isBoolean(value: JSONValue): value is boolean {
	return typeof value === "boolean";
}

/**
 * Non-negative safe integer check.
 *
 * @pure true
 * @invariant true → Number.isSafeInteger(value) ∧ value ≥ 0
 */
export function isNonNegativeInteger(value: JSONValue): value is number {
	return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Short human label for a JSON value's kind, used in diagnostics.
 */
export function describeJSONKind(value: JSONValue): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}
