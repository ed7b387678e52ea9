#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper, the single point of process.exit
// FORMAT THEOREM: ∀run: main resolves with exitCode → process.exit(exitCode) occurs exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: No process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { main } from "../main.js";

void main({
	argv: process.argv.slice(2),
	selfPath: process.argv[1] ?? "argbind",
	baseEnv: process.env,
}).then(
	(code) => {
		process.exit(code);
	},
	(error: Error) => {
		console.error("Fatal error:", error);
		process.exit(1);
	},
);
