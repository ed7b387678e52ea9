// CHANGE: Matching engine driving the token cursor against a compiled schema
// PURITY: CORE
// INVARIANT: Strict left-to-right single pass; lookahead never exceeds one occurrence's arity
// COMPLEXITY: O(t + a) where t = |argv|, a = declared arguments per level

import { Either } from "effect";
import { match } from "ts-pattern";

import {
	type MatchError,
	MissingRequired,
	MissingSubcommand,
	MissingValue,
	UnexpectedArgument,
	UnexpectedValue,
	UnknownArgument,
} from "../errors.js";
import { scan, type TokenCursor } from "../scan/scanner.js";
import type { MatchedLevel, MatchOutcome } from "../types/parse.js";
import {
	type ArgumentSpec,
	type CommandSpec,
	isPositional,
	isUnbounded,
	type Schema,
} from "../types/schema.js";
import type { Token } from "../types/token.js";
import {
	applyOccurrence,
	createStateBuilder,
	displayName,
	freezeState,
	type StateBuilder,
} from "./state.js";

type Matched<A> = Either.Either<A, MatchError>;

type Step =
	| { readonly _tag: "Continue" }
	| { readonly _tag: "Stop"; readonly outcome: MatchOutcome }
	| { readonly _tag: "Descend"; readonly subcommand: CommandSpec };

const CONTINUE: Step = { _tag: "Continue" };

/**
 * Built-in `--help`/`-h` and `--version`/`-V`, unless the command claims the spelling.
 */
function builtinFor(
	command: CommandSpec,
	spelling: { readonly long: string } | { readonly short: string },
): "help" | "version" | undefined {
	const claimed = command.args.some((arg) =>
		"long" in spelling ? arg.long === spelling.long : arg.short === spelling.short,
	);
	if (claimed) return undefined;
	const name = "long" in spelling ? spelling.long : spelling.short;
	if (name === "help" || name === "h") return "help";
	if ((name === "version" || name === "V") && command.version !== undefined) {
		return "version";
	}
	return undefined;
}

/**
 * Matches one command level. Mutable fields live only for the duration of `run()`.
 */
class LevelMatcher {
	private readonly builder: StateBuilder = createStateBuilder();
	private readonly positionals: ReadonlyArray<ArgumentSpec>;
	private positionalIndex = 0;
	private pending: string[] = [];

	constructor(
		private readonly command: CommandSpec,
		private readonly cursor: TokenCursor,
		private readonly ancestors: ReadonlyArray<MatchedLevel>,
	) {
		this.positionals = command.args.filter(isPositional);
	}

	run(): Matched<MatchOutcome> {
		for (let token = this.cursor.next(); token !== undefined; token = this.cursor.next()) {
			const step = this.step(token);
			if (Either.isLeft(step)) return Either.left(step.left);
			const outcome = match(step.right)
				.with({ _tag: "Continue" }, () => undefined)
				.with({ _tag: "Stop" }, ({ outcome: stopped }) => Either.right(stopped))
				.with({ _tag: "Descend" }, ({ subcommand }) => this.descend(subcommand))
				.exhaustive();
			if (outcome !== undefined) return outcome;
		}
		return this.finish().pipe(
			Either.flatMap((level): Matched<MatchOutcome> =>
				this.command.executable === undefined
					? Either.left(
							new MissingSubcommand({
								command: this.command.name,
								available: this.command.subcommands.map((sub) => sub.name),
							}),
						)
					: Either.right<MatchOutcome>({
							_tag: "Matched",
							path: [...this.ancestors, level],
							executable: this.command.executable,
						}),
			),
		);
	}

	private step(token: Token): Matched<Step> {
		return match(token)
			.with({ kind: "Terminator" }, () => Either.right(CONTINUE))
			.with({ kind: "LongOption" }, (t) =>
				this.option(
					builtinFor(this.command, { long: t.name }),
					this.command.args.find((arg) => arg.long === t.name),
					`--${t.name}`,
					t.inlineValue,
				),
			)
			.with({ kind: "ShortOption" }, (t) =>
				this.option(
					builtinFor(this.command, { short: t.name }),
					this.command.args.find((arg) => arg.short === t.name),
					`-${t.name}`,
					undefined,
				),
			)
			.with({ kind: "Positional" }, (t) => this.positional(t.raw))
			.exhaustive();
	}

	private option(
		builtin: "help" | "version" | undefined,
		spec: ArgumentSpec | undefined,
		flag: string,
		inlineValue: string | undefined,
	): Matched<Step> {
		if (builtin === "help") {
			return Either.right<Step>({
				_tag: "Stop",
				outcome: {
					_tag: "HelpRequested",
					path: [...this.ancestors.map((level) => level.command), this.command],
				},
			});
		}
		if (builtin === "version") {
			return Either.right<Step>({
				_tag: "Stop",
				outcome: { _tag: "VersionRequested", command: this.command },
			});
		}
		if (spec === undefined) {
			return Either.left(new UnknownArgument({ token: flag }));
		}
		const arity = spec.numberOfValues;
		if (inlineValue !== undefined && arity === 0) {
			return Either.left(new UnexpectedValue({ flag, value: inlineValue }));
		}
		const values =
			inlineValue === undefined
				? this.cursor.takeRaw(arity)
				: [inlineValue, ...this.cursor.takeRaw(arity - 1)];
		if (values.length < arity) {
			return Either.left(
				new MissingValue({
					key: spec.key,
					flag,
					expected: arity,
					shortfall: arity - values.length,
				}),
			);
		}
		applyOccurrence(this.builder, spec, values);
		return Either.right(CONTINUE);
	}

	private positional(raw: string): Matched<Step> {
		if (!this.cursor.terminatorSeen && this.pending.length === 0) {
			const subcommand = this.command.subcommands.find((sub) => sub.name === raw);
			if (subcommand !== undefined) {
				return Either.right<Step>({ _tag: "Descend", subcommand });
			}
		}
		const spec = this.positionals[this.positionalIndex];
		if (spec === undefined) {
			return Either.left(new UnexpectedArgument({ token: raw }));
		}
		this.pending.push(raw);
		if (this.pending.length === spec.numberOfValues) {
			applyOccurrence(this.builder, spec, this.pending);
			this.pending = [];
			if (!isUnbounded(spec)) this.positionalIndex += 1;
		}
		return Either.right(CONTINUE);
	}

	private descend(subcommand: CommandSpec): Matched<MatchOutcome> {
		return this.finish().pipe(
			Either.flatMap((level) =>
				new LevelMatcher(subcommand, this.cursor, [...this.ancestors, level]).run(),
			),
		);
	}

	/**
	 * End-of-level checks: a half-filled positional, then required arguments.
	 */
	private finish(): Matched<MatchedLevel> {
		const partial = this.positionals[this.positionalIndex];
		if (partial !== undefined && this.pending.length > 0) {
			return Either.left(
				new MissingValue({
					key: partial.key,
					flag: displayName(partial),
					expected: partial.numberOfValues,
					shortfall: partial.numberOfValues - this.pending.length,
				}),
			);
		}
		const missing = this.command.args.find(
			(arg) => arg.required && !this.builder.seen.has(arg.key),
		);
		if (missing !== undefined) {
			return Either.left(
				new MissingRequired({ key: missing.key, flag: displayName(missing) }),
			);
		}
		return Either.right<MatchedLevel>({
			command: this.command,
			state: freezeState(
				this.builder,
				this.cursor.position,
				this.cursor.terminatorSeen,
			),
		});
	}
}

/**
 * Matches `argv` (program name excluded) against a compiled schema.
 *
 * @pure true
 * @invariant Left(error) → no partial result is observable
 * @complexity O(t + a)
 *
 * @example
 * ```ts
 * const outcome = matchArgv(schema, ["--arg1", "a", "b", "value"]);
 * // Either.isRight(outcome) && outcome.right._tag === "Matched"
 * ```
 */
export function matchArgv(
	schema: Schema,
	argv: ReadonlyArray<string>,
): Matched<MatchOutcome> {
	return new LevelMatcher(schema.root, scan(argv).cursor(), []).run();
}
