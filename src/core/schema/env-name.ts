// CHANGE: Deterministic key → environment variable name transliteration
// PURITY: CORE
// INVARIANT: toEnvName(k) matches ENV_NAME_PATTERN for every non-empty k
// COMPLEXITY: O(|key|)

export const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/u;

const isWordChar = (c: string): boolean => /^[A-Za-z0-9_]$/u.test(c);
const isAsciiLetter = (c: string): boolean => /^[A-Za-z]$/u.test(c);

/**
 * Upper-cases the key, maps every character outside `[A-Za-z0-9_]` to `_`
 * and replaces a first character that is not a letter or `_` with `_`.
 *
 * @pure true
 * @example
 * ```ts
 * toEnvName("dry-run"); // "DRY_RUN"
 * toEnvName("2fa");     // "_FA"
 * ```
 */
export function toEnvName(key: string): string {
	return Array.from(key, (c, i) => {
		const mapped = isWordChar(c) ? c : "_";
		return i === 0 && !isAsciiLetter(mapped) && mapped !== "_" ? "_" : mapped;
	})
		.join("")
		.toUpperCase();
}

export const isValidEnvName = (name: string): boolean =>
	ENV_NAME_PATTERN.test(name);
