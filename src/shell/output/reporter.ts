// CHANGE: Console output for help, version and diagnostics
// PURITY: SHELL (console I/O)
// INVARIANT: Diagnostics go to stderr; help and version go to stdout

import { Console, Effect } from "effect";

import type { AppError } from "../../core/errors.js";
import { formatDiagnostic, isMatchError } from "../../core/format/diagnostic.js";

export const HELP_HINT = "For more information, try '--help'.";

/**
 * Prints pre-rendered text without adding a second trailing newline.
 */
export const printText = (text: string): Effect.Effect<void> =>
	Console.log(text.endsWith("\n") ? text.slice(0, -1) : text);

/**
 * Reports a terminal failure; usage errors get the help hint.
 */
export function reportError(error: AppError): Effect.Effect<void> {
	return Effect.gen(function* () {
		yield* Console.error(formatDiagnostic(error));
		if (isMatchError(error)) {
			yield* Console.error(`\n${HELP_HINT}`);
		}
	});
}
