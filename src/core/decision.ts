// CHANGE: Map failures and child termination to argbind's exit status
// PURITY: CORE
// FORMAT THEOREM: ∀e ∈ MatchError: exitCodeForError(e) = 2; ∀e ∈ AppError \ MatchError: exitCodeForError(e) = 1
// COMPLEXITY: O(1)

import { pipe } from "effect";

import type { AppError } from "./errors.js";
import { isMatchError } from "./format/diagnostic.js";
import {
	type ChildExit,
	EXIT_FAILURE,
	EXIT_USAGE,
	type ExitCode,
} from "./models.js";

/**
 * @pure true
 * @invariant result ∈ {1, 2}
 */
export const exitCodeForError = (error: AppError): ExitCode =>
	pipe(error, isMatchError, (usage) => (usage ? EXIT_USAGE : EXIT_FAILURE));

/**
 * Shell convention: a child killed by signal N exits with 128 + N.
 *
 * @pure true
 */
export function exitCodeForChild(exit: ChildExit): ExitCode {
	if (exit.code !== undefined) return exit.code;
	if (exit.signalNumber !== undefined) return 128 + exit.signalNumber;
	return EXIT_FAILURE;
}
