#!/usr/bin/env node

// CHANGE: Thin CLI wrapper for guard verification - single point of process.exit
// FORMAT THEOREM: ∀run: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { Effect, Either } from "effect";

import { describeFatal } from "../app/prepare.js";
import { runGuardVerification } from "../app/run-guards.js";
import { parseCLIArgs, usage } from "../shell/config/index.js";

void (async (): Promise<void> => {
	try {
		const parsed = parseCLIArgs(
			process.argv.slice(2),
			process.env,
			process.stdout.isTTY === true,
		);
		if (Either.isLeft(parsed)) {
			console.error(describeFatal(parsed.left));
			console.error(usage("verify-guards"));
			process.exit(1);
		}
		const code = await Effect.runPromise(runGuardVerification(parsed.right));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
