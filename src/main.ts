// CHANGE: Thin APP delegator for programmatic use
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as a value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { type RunOptions, runArgbind } from "./app/runArgbind.js";
import type { ExitCode } from "./core/models.js";
import { ProcessHandoffLive } from "./shell/process/handoff.js";

/**
 * Runs argbind with the live process handoff and resolves with its exit status.
 *
 * @pure false (may start the target executable), but does not call process.exit
 */
export function main(options: RunOptions): Promise<ExitCode> {
	return Effect.runPromise(
		runArgbind(options).pipe(Effect.provide(ProcessHandoffLive)),
	);
}
