/**
 * Hook input decoding
 * Validates the Claude Code hook envelope and maps it onto a ToolEvent
 */

import { z } from "zod";
import type { ToolEvent } from "./types.ts";

/** Claude Code hook input; unknown keys are ignored */
export const ClaudeHookInputSchema = z.object({
	session_id: z.string().optional(),
	cwd: z.string().optional(),
	hook_event_name: z.string().optional(),
	tool_name: z.string().optional(),
	tool_input: z
		.object({
			command: z.string().optional(),
			new_string: z.string().optional(),
			content: z.string().optional(),
			file_path: z.string().optional(),
		})
		.optional(),
});

export type ClaudeHookInput = z.infer<typeof ClaudeHookInputSchema>;

/**
 * Map a decoded Claude hook input onto a ToolEvent.
 * Tools without rules (Task, Glob, Grep, Read, WebFetch, WebSearch, MCP tools, …) become `other`.
 */
export function toToolEvent(input: ClaudeHookInput): ToolEvent {
	const toolInput = input.tool_input ?? {};

	switch (input.tool_name) {
		case "Bash":
			return { kind: "shell", command: toolInput.command };
		case "Edit":
		case "Write":
			return {
				kind: input.tool_name === "Edit" ? "edit" : "write",
				filePath: toolInput.file_path,
				newString: toolInput.new_string,
				content: toolInput.content,
			};
		default:
			return { kind: "other", toolName: input.tool_name ?? "" };
	}
}

/** Outcome of decoding raw stdin text */
export type DecodeResult =
	| { ok: true; input: ClaudeHookInput; event: ToolEvent }
	| { ok: false; error: string };

/**
 * Parse and validate raw hook input text
 */
export function decodeHookInput(raw: string): DecodeResult {
	if (!raw.trim()) {
		return { ok: false, error: "empty input" };
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		return {
			ok: false,
			error: error instanceof Error ? error.message : String(error),
		};
	}

	const parsed = ClaudeHookInputSchema.safeParse(json);
	if (!parsed.success) {
		return { ok: false, error: parsed.error.message };
	}

	return { ok: true, input: parsed.data, event: toToolEvent(parsed.data) };
}
