// CHANGE: Application layer composing own-CLI parsing, document loading, the core and the handoff
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never, ProcessHandoff>
// INVARIANT: The handoff is reached only after compile, match and binding all succeeded
// COMPLEXITY: O(d + t) where d = document size, t = |argv|

import { Effect } from "effect";
import { match } from "ts-pattern";

import { formatBindings, withBinding } from "../core/bindings/formatter.js";
import { exitCodeForChild, exitCodeForError } from "../core/decision.js";
import { type AppError, CliUsageError } from "../core/errors.js";
import { renderHelp, renderVersion } from "../core/format/help.js";
import { matchArgv } from "../core/match/engine.js";
import { EXIT_OK, type ExitCode } from "../core/models.js";
import { compileSchema } from "../core/schema/compiler.js";
import type { Bindings, MatchedLevel, MatchOutcome } from "../core/types/parse.js";
import type { Schema } from "../core/types/schema.js";
import { parseSelfArgs, type SelfCommand } from "../shell/config/cli.js";
import { loadDocument } from "../shell/config/document.js";
import { loadSettings, type Settings } from "../shell/config/settings.js";
import { withLogging } from "../shell/logging.js";
import { printText, reportError } from "../shell/output/reporter.js";
import { ProcessHandoff } from "../shell/process/handoff.js";

export interface RunOptions {
	/** argbind's arguments without node and script path. */
	readonly argv: ReadonlyArray<string>;
	/** Path exposed to the target with --add-self-to-env. */
	readonly selfPath: string;
	readonly baseEnv: Readonly<Record<string, string | undefined>>;
}

type Step = Effect.Effect<ExitCode, AppError, ProcessHandoff>;

const printAndSucceed = (text: string): Step =>
	printText(text).pipe(Effect.as(EXIT_OK));

/**
 * Hands the matched command to the target executable.
 */
function launch(
	bindings: Bindings,
	executable: string,
	options: RunOptions,
): Step {
	return Effect.gen(function* () {
		const handoff = yield* ProcessHandoff;
		yield* Effect.logDebug(
			`starting ${executable} with ${[...bindings.keys()].join(" ") || "no bindings"}`,
		);
		const exit = yield* handoff.run({
			executable,
			bindings,
			baseEnv: options.baseEnv,
		});
		yield* Effect.logDebug(
			`${executable} exited with ${exit.code ?? exit.signal ?? "unknown status"}`,
		);
		return exitCodeForChild(exit);
	});
}

/**
 * Adds argbind's own path unless an argument on the matched path already
 * owns the variable name.
 */
function bindSelf(
	bindings: Bindings,
	path: ReadonlyArray<MatchedLevel>,
	selfVar: string,
	selfPath: string,
): Effect.Effect<Bindings, CliUsageError> {
	const owner = path
		.flatMap((level) => level.command.args)
		.find((arg) => arg.envName === selfVar);
	return owner === undefined
		? Effect.succeed(withBinding(bindings, selfVar, selfPath))
		: Effect.fail(
				new CliUsageError({
					detail: `${selfVar} is already bound by argument "${owner.key}"; set ARGBIND_SELF_VAR to another name`,
				}),
			);
}

function dispatch(
	outcome: MatchOutcome,
	command: Extract<SelfCommand, { _tag: "Run" }>,
	settings: Settings,
	options: RunOptions,
	schema: Schema,
): Step {
	return match(outcome)
		.with({ _tag: "HelpRequested" }, ({ path }) => printAndSucceed(renderHelp(path)))
		.with({ _tag: "VersionRequested" }, ({ command: target }) =>
			printAndSucceed(renderVersion(target)),
		)
		.with({ _tag: "Matched" }, ({ path, executable }) =>
			Effect.gen(function* () {
				const bindings = formatBindings(schema, path);
				const full = command.addSelfToEnv
					? yield* bindSelf(bindings, path, settings.selfVar, options.selfPath)
					: bindings;
				return yield* launch(full, executable, options);
			}),
		)
		.exhaustive();
}

function runCommand(
	command: SelfCommand,
	settings: Settings,
	options: RunOptions,
): Step {
	return match(command)
		.with({ _tag: "Print" }, ({ text }) => printAndSucceed(text))
		.with({ _tag: "Run" }, (run) =>
			Effect.gen(function* () {
				const document = yield* loadDocument(run.plan);
				const schema = yield* compileSchema(document);
				yield* Effect.logDebug(
					`compiled schema for ${schema.root.name} with ${schema.root.args.length} arguments`,
				);
				const outcome = yield* matchArgv(schema, run.trailing);
				return yield* dispatch(outcome, run, settings, options, schema);
			}),
		)
		.exhaustive();
}

/**
 * Runs one argbind invocation and returns the exit status as a value.
 *
 * @effect Effect<ExitCode, never, ProcessHandoff> - every failure is reported and mapped to a status
 * @postcondition failure → the target executable was never started
 */
export function runArgbind(
	options: RunOptions,
): Effect.Effect<ExitCode, never, ProcessHandoff> {
	const program = Effect.gen(function* () {
		const settings = yield* loadSettings;
		const command = yield* parseSelfArgs(options.argv);
		return yield* runCommand(command, settings, options).pipe(
			withLogging(settings.logLevel),
		);
	});
	return program.pipe(
		Effect.catchAll((error) =>
			reportError(error).pipe(Effect.as(exitCodeForError(error))),
		),
	);
}
