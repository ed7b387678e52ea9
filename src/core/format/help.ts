// CHANGE: Usage/help text rendered from the compiled command path
// PURITY: CORE
// INVARIANT: Output depends only on the CommandSpec path; lines have no trailing spaces
// COMPLEXITY: O(a) where a = declared arguments + subcommands

import { placeholder } from "../match/state.js";
import {
	type ArgumentSpec,
	type CommandSpec,
	isPositional,
	isUnbounded,
} from "../types/schema.js";

interface HelpRow {
	readonly label: string;
	readonly text: string;
}

const repeatPlaceholder = (spec: ArgumentSpec): string =>
	Array.from({ length: spec.numberOfValues }, () => `<${placeholder(spec)}>`).join(" ");

function positionalUsage(spec: ArgumentSpec): string {
	const values = repeatPlaceholder(spec);
	const body = spec.required ? values : `[${values}]`;
	return isUnbounded(spec) ? `${body}...` : body;
}

function optionLabel(spec: ArgumentSpec): string {
	const names = [
		spec.short === undefined ? "    " : `-${spec.short}, `,
		spec.long === undefined ? "" : `--${spec.long}`,
	].join("");
	const trimmed = spec.long === undefined ? names.replace(/, $/u, "") : names;
	return spec.numberOfValues === 0 ? trimmed : `${trimmed} ${repeatPlaceholder(spec)}`;
}

function describe(spec: ArgumentSpec): string {
	const notes = [
		spec.required ? "[required]" : undefined,
		spec.defaultValue === undefined ? undefined : `[default: ${spec.defaultValue}]`,
		`[env: ${spec.envName}]`,
	].filter((note): note is string => note !== undefined);
	return [spec.help, ...notes]
		.filter((part): part is string => part !== undefined)
		.join(" ");
}

function renderSection(title: string, rows: ReadonlyArray<HelpRow>): string[] {
	if (rows.length === 0) return [];
	const width = Math.max(...rows.map((row) => row.label.length));
	return [
		"",
		`${title}:`,
		...rows.map((row) =>
			row.text.length === 0
				? `  ${row.label}`
				: `  ${row.label.padEnd(width)}  ${row.text}`,
		),
	];
}

function usageLine(path: ReadonlyArray<CommandSpec>, command: CommandSpec): string {
	const positionals = command.args.filter(isPositional).map(positionalUsage);
	const subcommand =
		command.subcommands.length === 0
			? []
			: [command.executable === undefined ? "<COMMAND>" : "[COMMAND]"];
	return [
		"Usage:",
		...path.map((level) => level.name),
		"[OPTIONS]",
		...positionals,
		...subcommand,
	].join(" ");
}

/**
 * Renders help for the last command of `path` (root first).
 *
 * @pure true
 * @precondition path.length > 0
 */
export function renderHelp(path: ReadonlyArray<CommandSpec>): string {
	const command = path.at(-1);
	if (command === undefined) return "";
	const options = command.args.filter((arg) => !isPositional(arg));
	const claimed = (long: string): boolean =>
		command.args.some((arg) => arg.long === long);
	const builtins: HelpRow[] = [
		...(claimed("help") ? [] : [{ label: "-h, --help", text: "Print help" }]),
		...(command.version === undefined || claimed("version")
			? []
			: [{ label: "-V, --version", text: "Print version" }]),
	];
	const lines = [
		...(command.about === undefined ? [] : [command.about, ""]),
		usageLine(path, command),
		...renderSection(
			"Commands",
			command.subcommands.map((sub) => ({ label: sub.name, text: sub.about ?? "" })),
		),
		...renderSection(
			"Arguments",
			command.args
				.filter(isPositional)
				.map((arg) => ({ label: positionalUsage(arg), text: describe(arg) })),
		),
		...renderSection("Options", [
			...options.map((arg) => ({ label: optionLabel(arg), text: describe(arg) })),
			...builtins,
		]),
	];
	return `${lines.join("\n")}\n`;
}

/**
 * @pure true
 */
export const renderVersion = (command: CommandSpec): string =>
	`${command.name} ${command.version ?? ""}`.trimEnd() + "\n";
