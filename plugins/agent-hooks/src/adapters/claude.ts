/**
 * Claude Code hook adapter
 * Reads hook input from stdin and writes the hook response to stdout
 */

import { writeAuditLog } from "../audit.ts";
import { isAuditEnabled, isDebugEnabled } from "../config.ts";
import { decodeHookInput } from "../events.ts";
import type { PatternRegistry } from "../patterns.ts";
import { evaluateFileEdit, evaluateShellCommand } from "../policy.ts";
import type {
	ClaudeHookEventName,
	ClaudeHookOutput,
	PolicyConfig,
	ToolEvent,
	Verdict,
} from "../types.ts";

/** Hook subcommands the CLI exposes */
export type ClaudeHookMode = "permission-request" | "pre-tool-use";

const EVENT_NAMES: Record<ClaudeHookMode, ClaudeHookEventName> = {
	"permission-request": "PermissionRequest",
	"pre-tool-use": "PreToolUse",
};

/**
 * Map a verdict to Claude hook output, or null when nothing should be printed
 */
export function mapVerdict(
	verdict: Verdict,
	mode: ClaudeHookMode,
): ClaudeHookOutput | null {
	const hookEventName = EVENT_NAMES[mode];

	switch (verdict.type) {
		case "deny":
			// PermissionRequest hooks answer with a decision object
			if (mode === "permission-request") {
				return {
					hookSpecificOutput: {
						hookEventName,
						decision: { behavior: "deny", message: verdict.message },
					},
				};
			}
			return {
				hookSpecificOutput: {
					hookEventName,
					permissionDecision: "deny",
					permissionDecisionReason: verdict.message,
				},
			};

		case "ask":
			return {
				hookSpecificOutput: {
					hookEventName,
					permissionDecision: "ask",
					permissionDecisionReason: verdict.reason,
				},
			};

		case "no-opinion":
			return null;
	}
}

/** Whether any check this mode runs is enabled */
export function hasEnabledChecks(
	mode: ClaudeHookMode,
	config: PolicyConfig,
): boolean {
	return mode === "permission-request"
		? config.blockRm || config.confirmDestructiveFind
		: config.denyRustAllow;
}

/**
 * Evaluate one event for a hook mode.
 * permission-request only looks at shell commands, pre-tool-use only at edits and writes.
 */
export function evaluateForMode(
	event: ToolEvent,
	mode: ClaudeHookMode,
	config: PolicyConfig,
	registry?: PatternRegistry,
): Verdict {
	if (mode === "permission-request") {
		return event.kind === "shell"
			? evaluateShellCommand(event.command, config, registry)
			: { type: "no-opinion" };
	}

	return event.kind === "edit" || event.kind === "write"
		? evaluateFileEdit(event, config, registry)
		: { type: "no-opinion" };
}

/** Result of processing raw hook input */
export interface ProcessedHook {
	event?: ToolEvent;
	sessionId?: string;
	cwd?: string;
	verdict: Verdict;
	output: ClaudeHookOutput | null;
}

/**
 * Process raw Claude Code hook input.
 * Undecodable input yields no opinion.
 */
export function processClaudeHook(
	raw: string,
	mode: ClaudeHookMode,
	config: PolicyConfig,
	registry?: PatternRegistry,
): ProcessedHook {
	const decoded = decodeHookInput(raw);
	if (!decoded.ok) {
		if (isDebugEnabled()) {
			console.error(`[agent-hooks] Ignoring hook input: ${decoded.error}`);
		}
		return { verdict: { type: "no-opinion" }, output: null };
	}

	const verdict = evaluateForMode(decoded.event, mode, config, registry);
	return {
		event: decoded.event,
		sessionId: decoded.input.session_id,
		cwd: decoded.input.cwd,
		verdict,
		output: mapVerdict(verdict, mode),
	};
}

/** Byte or text chunks, as process.stdin yields them */
export type HookInputStream = AsyncIterable<string | Buffer>;

/**
 * Read the whole input stream as UTF-8
 */
async function readStdin(input: HookInputStream): Promise<string> {
	const chunks: Buffer[] = [];

	for await (const chunk of input) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
	}

	return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Main entry point for the Claude Code adapter.
 * Prints at most one JSON line; no-opinion prints nothing.
 */
export async function runClaudeAdapter(
	mode: ClaudeHookMode,
	config: PolicyConfig,
	registry?: PatternRegistry,
	input: HookInputStream = process.stdin,
): Promise<void> {
	if (!hasEnabledChecks(mode, config)) {
		return;
	}

	let raw: string;
	try {
		raw = await readStdin(input);
	} catch (error) {
		if (isDebugEnabled()) {
			console.error("[agent-hooks] Could not read stdin:", error);
		}
		return;
	}

	const result = processClaudeHook(raw, mode, config, registry);

	if (result.event && isAuditEnabled()) {
		await writeAuditLog(result.event, result.verdict, result.sessionId, result.cwd);
	}

	if (!result.output) {
		return;
	}

	let line: string;
	try {
		line = JSON.stringify(result.output);
	} catch (error) {
		console.error("[agent-hooks] Could not encode hook output:", error);
		return;
	}
	process.stdout.write(`${line}\n`);
}
