// CHANGE: Exit status model for argbind
// PURITY: CORE
// INVARIANT: argbind's own statuses are 0, 1 or 2; after handoff the child's status is passed through

/**
 * Process exit status.
 *
 * @remarks
 * - 0: help or version printed
 * - 1: schema, document, handoff or internal failure
 * - 2: usage error in the parsed command line
 * - any other value: exit status of the target executable
 */
export type ExitCode = number;

export const EXIT_OK: ExitCode = 0;
export const EXIT_FAILURE: ExitCode = 1;
export const EXIT_USAGE: ExitCode = 2;

/**
 * How the target executable ended.
 *
 * @invariant exactly one of code / signalNumber is defined
 */
export interface ChildExit {
	readonly code: number | undefined;
	readonly signal: string | undefined;
	readonly signalNumber: number | undefined;
}
