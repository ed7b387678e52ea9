// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: CORE exports are pure; SHELL internals stay hidden except the handoff service seam
// COMPLEXITY: O(1)

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs one invocation the way the `argbind` binary does, without exiting.
 *
 * @example
 * ```typescript
 * import { main } from "argbind";
 *
 * const code = await main({
 *   argv: ["--json-file", "greet.json", "--", "--name", "world"],
 *   selfPath: "/usr/local/bin/argbind",
 *   baseEnv: process.env,
 * });
 * ```
 *
 * @pure false - may start the target executable
 */
export { main } from "./main.js";
export { type RunOptions, runArgbind } from "./app/runArgbind.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { ChildExit, ExitCode } from "./core/models.js";
export { EXIT_FAILURE, EXIT_OK, EXIT_USAGE } from "./core/models.js";
export * from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS (Tagged ADT)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	CliUsageError,
	DocumentError,
	HandoffError,
	type MatchError,
	MissingRequired,
	MissingSubcommand,
	MissingValue,
	SchemaError,
	UnexpectedArgument,
	UnexpectedValue,
	UnknownArgument,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Document → Schema. Returns Either<Schema, SchemaError>.
 */
export {
	compileArgument,
	compileSchema,
	DEFAULT_VALUE_SEPARATOR,
} from "./core/schema/compiler.js";
export { isValidEnvName, toEnvName } from "./core/schema/env-name.js";
export { mergeDocuments } from "./core/schema/merge.js";
export {
	classify,
	scan,
	TERMINATOR,
	TokenCursor,
	TokenSequence,
} from "./core/scan/scanner.js";
export { matchArgv } from "./core/match/engine.js";
export {
	bindingValue,
	FALSE_SENTINEL,
	formatBindings,
	TRUE_SENTINEL,
	withBinding,
} from "./core/bindings/formatter.js";
export { renderHelp, renderVersion } from "./core/format/help.js";
export { formatDiagnostic, isMatchError } from "./core/format/diagnostic.js";
export { exitCodeForChild, exitCodeForError } from "./core/decision.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SEAMS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type HandoffRequest,
	makeProcessHandoff,
	ProcessHandoff,
	ProcessHandoffLive,
	type ProcessHandoffService,
} from "./shell/process/handoff.js";
