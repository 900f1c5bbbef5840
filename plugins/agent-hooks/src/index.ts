/**
 * agent-hooks - Guard AI coding agents against destructive commands and lint suppression
 *
 * Library entry point; the CLI lives in cli.ts
 */

export {
	mapVerdict,
	processClaudeHook,
	runClaudeAdapter,
} from "./adapters/claude.ts";
export { AgentHooks, createOpenCodePlugin } from "./adapters/opencode.ts";
export { loadConfig, resolvePolicyConfig } from "./config.ts";
export { decodeHookInput, toToolEvent } from "./events.ts";
export {
	createPatternRegistry,
	getPatternRegistry,
	type PatternRegistry,
} from "./patterns.ts";
export {
	evaluateEvent,
	evaluateFileEdit,
	evaluateShellCommand,
} from "./policy.ts";
export { checkDestructiveFind, isDestructiveDelete } from "./rules/index.ts";
export {
	detectSuppressionAttributes,
	isExcludedPosition,
	isRustFile,
} from "./source/index.ts";
export type {
	AttributeFinding,
	Platform,
	PolicyConfig,
	ToolEvent,
	Verdict,
} from "./types.ts";
