// CHANGE: Process Handoff: start the target executable with the bindings in its environment
// PURITY: SHELL (spawns a process, installs signal handlers)
// EFFECT: Effect<ChildExit, HandoffError>
// INVARIANT: Runs at most once per invocation and only after every fallible core step succeeded
// NOTE: Node.js cannot replace the running process image, so the target runs as a child
//       with inherited stdio and argbind exits with its status

import { type ChildProcess, spawn, type SpawnOptions } from "node:child_process";
import { constants } from "node:os";

import { Context, Effect, Either, Layer } from "effect";

import { HandoffError } from "../../core/errors.js";
import type { ChildExit } from "../../core/models.js";
import type { Bindings } from "../../core/types/parse.js";

export interface HandoffRequest {
	readonly executable: string;
	readonly bindings: Bindings;
	/** Environment the bindings are layered onto. */
	readonly baseEnv: Readonly<Record<string, string | undefined>>;
}

export interface ProcessHandoffService {
	readonly run: (request: HandoffRequest) => Effect.Effect<ChildExit, HandoffError>;
}

export class ProcessHandoff extends Context.Tag("ProcessHandoff")<
	ProcessHandoff,
	ProcessHandoffService
>() {}

export type SpawnFn = (
	command: string,
	args: ReadonlyArray<string>,
	options: SpawnOptions,
) => ChildProcess;

/**
 * Signals relayed to the child while it runs.
 */
export const FORWARDED_SIGNALS: ReadonlyArray<NodeJS.Signals> = [
	"SIGINT",
	"SIGTERM",
	"SIGHUP",
];

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export const signalNumber = (signal: string | null): number | undefined =>
	signal === null ? undefined : SIGNAL_NUMBERS.get(signal);

/**
 * @pure true
 * @postcondition bindings override same-named base variables
 */
export function childEnvironment(
	baseEnv: Readonly<Record<string, string | undefined>>,
	bindings: Bindings,
): Record<string, string> {
	const env: Record<string, string> = {};
	for (const [name, value] of Object.entries(baseEnv)) {
		if (value !== undefined) env[name] = value;
	}
	for (const [name, value] of bindings) {
		env[name] = value;
	}
	return env;
}

export interface SignalSource {
	on(signal: NodeJS.Signals, handler: () => void): void;
	off(signal: NodeJS.Signals, handler: () => void): void;
}

export interface ProcessHandoffOptions {
	readonly spawn?: SpawnFn;
	readonly signals?: ReadonlyArray<NodeJS.Signals>;
	/** Where forwarded signals are observed; the current process by default. */
	readonly signalSource?: SignalSource;
}

export function makeProcessHandoff(
	options: ProcessHandoffOptions = {},
): ProcessHandoffService {
	const spawnFn: SpawnFn = options.spawn ?? spawn;
	const signals = options.signals ?? FORWARDED_SIGNALS;
	const source: SignalSource = options.signalSource ?? process;

	const run = (request: HandoffRequest): Effect.Effect<ChildExit, HandoffError> =>
		Effect.async<ChildExit, HandoffError>((resume) => {
			let settled = false;
			const handlers = new Map<NodeJS.Signals, () => void>();
			const cleanup = (): void => {
				for (const [signal, handler] of handlers) source.off(signal, handler);
				handlers.clear();
			};
			const settle = (effect: Effect.Effect<ChildExit, HandoffError>): void => {
				if (settled) return;
				settled = true;
				cleanup();
				resume(effect);
			};
			const fail = (error: Error): void => {
				settle(
					Effect.fail(
						new HandoffError({ executable: request.executable, detail: error.message }),
					),
				);
			};

			const started = Either.try({
				try: () =>
					spawnFn(request.executable, [], {
						stdio: "inherit",
						env: childEnvironment(request.baseEnv, request.bindings),
					}),
				catch: (error) => (error instanceof Error ? error : new Error(String(error))),
			});
			if (Either.isLeft(started)) {
				fail(started.left);
				return;
			}
			const child = started.right;

			for (const signal of signals) {
				const handler = (): void => {
					child.kill(signal);
				};
				handlers.set(signal, handler);
				source.on(signal, handler);
			}
			child.once("error", fail);
			child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
				settle(
					Effect.succeed({
						code: code ?? undefined,
						signal: signal ?? undefined,
						signalNumber: signalNumber(signal),
					}),
				);
			});
			return Effect.sync(cleanup);
		});

	return { run };
}

export const ProcessHandoffLive = Layer.succeed(ProcessHandoff, makeProcessHandoff());
