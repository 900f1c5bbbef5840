#!/usr/bin/env tsx
import { main } from "./cli.ts";

main(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		// Exit code 1 is a non-blocking error for Claude Code; the agent keeps going
		console.error("[agent-hooks] Fatal error:", error);
		process.exitCode = 1;
	});
