/**
 * OpenCode plugin adapter
 * Provides hooks for permission.ask and tool.execute.before
 */

import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { writeAuditLog } from "../audit.ts";
import {
	isAuditEnabled,
	loadConfigFile,
	mergeConfig,
	resolvePolicyConfig,
} from "../config.ts";
import type { PatternRegistry } from "../patterns.ts";
import { evaluateEvent, evaluateShellCommand } from "../policy.ts";
import type { PolicyConfig, PolicyOptions, ToolEvent, Verdict } from "../types.ts";

/** OpenCode permission request */
interface OpenCodePermission {
	type: string;
	pattern: string;
	sessionID?: string;
}

/** OpenCode permission output */
interface OpenCodePermissionOutput {
	status: "allow" | "deny" | "ask";
}

/** OpenCode tool input */
interface OpenCodeToolInput {
	tool: string;
	sessionID?: string;
}

/** OpenCode tool output */
interface OpenCodeToolOutput {
	args: Record<string, unknown>;
}

/** Structured log entry accepted by the OpenCode client */
export interface OpenCodeLogEntry {
	service: string;
	level: "debug" | "info" | "warn" | "error";
	message: string;
	extra?: Record<string, unknown>;
}

/** The part of the OpenCode SDK client the plugin uses */
export interface OpenCodeClient {
	app: {
		log(entry: OpenCodeLogEntry): Promise<unknown>;
	};
}

/** OpenCode plugin context */
export interface OpenCodeContext {
	directory?: string;
	client?: OpenCodeClient;
}

/** Plugin construction options */
export interface OpenCodePluginOptions {
	/** Path of agent_hooks.json; defaults to the one beside this module */
	configPath?: string;
	/** Options that override the config file and the defaults */
	overrides?: PolicyOptions;
	registry?: PatternRegistry;
	/** Audit log directory, when auditing is enabled */
	auditDir?: string;
}

/** agent_hooks.json next to the installed plugin, never in the project being edited */
export const DEFAULT_PLUGIN_CONFIG_PATH = join(
	dirname(fileURLToPath(import.meta.url)),
	"agent_hooks.json",
);

/** The plugin enables every check; only overrides turn one off */
const PLUGIN_DEFAULTS: PolicyOptions = {
	blockRm: true,
	confirmDestructiveFind: true,
	denyRustAllow: true,
	allowExpect: false,
};

function stringArg(args: Record<string, unknown>, key: string): string | undefined {
	const value = args[key];
	return typeof value === "string" ? value : undefined;
}

/** Map an OpenCode tool call onto a ToolEvent */
export function toOpenCodeEvent(
	tool: string,
	args: Record<string, unknown>,
): ToolEvent {
	switch (tool) {
		case "bash":
		case "shell":
			return { kind: "shell", command: stringArg(args, "command") };
		case "edit":
			return {
				kind: "edit",
				filePath: stringArg(args, "filePath"),
				newString: stringArg(args, "newString"),
			};
		case "write":
			return {
				kind: "write",
				filePath: stringArg(args, "filePath"),
				content: stringArg(args, "content"),
			};
		default:
			return { kind: "other", toolName: tool };
	}
}

/**
 * Resolve the plugin's policy from its config file and overrides.
 * The file may only tune the Rust check; the checks themselves stay on
 * unless the code creating the plugin overrides them.
 */
export function loadPluginConfig(options: OpenCodePluginOptions = {}): PolicyConfig {
	const { allowExpect, additionalContext } = loadConfigFile(
		options.configPath ?? DEFAULT_PLUGIN_CONFIG_PATH,
	);
	return resolvePolicyConfig(
		mergeConfig(
			options.overrides ?? {},
			{ allowExpect, additionalContext },
			PLUGIN_DEFAULTS,
		),
	);
}

function shellAuditKey(command: string | undefined, sessionId?: string): string {
	return `${sessionId ?? ""}\n${command ?? ""}`;
}

/**
 * Create an OpenCode plugin instance
 * Usage in ~/.config/opencode/plugin/agent-hooks.ts:
 *
 * import { createOpenCodePlugin } from "agent-hooks/adapters/opencode";
 * export const AgentHooks = createOpenCodePlugin;
 */
export function createOpenCodePlugin(
	context: OpenCodeContext,
	options: OpenCodePluginOptions = {},
) {
	const config = loadPluginConfig(options);
	const { registry, auditDir } = options;
	// Commands already audited as "ask" by permission.ask, awaiting tool.execute.before
	const askedCommands = new Set<string>();

	async function log(entry: Omit<OpenCodeLogEntry, "service">): Promise<void> {
		if (context.client) {
			await context.client.app.log({ service: "agent-hooks", ...entry });
		}
	}

	async function audit(
		event: ToolEvent,
		verdict: Verdict,
		sessionId?: string,
	): Promise<void> {
		if (isAuditEnabled()) {
			await writeAuditLog(event, verdict, sessionId, context.directory, auditDir);
		}
	}

	return {
		/**
		 * Intercept permission requests for bash commands
		 */
		"permission.ask": async (
			permission: OpenCodePermission,
			output: OpenCodePermissionOutput,
		): Promise<void> => {
			if (permission.type !== "bash") {
				return;
			}

			const event: ToolEvent = { kind: "shell", command: permission.pattern };
			const verdict = evaluateShellCommand(permission.pattern, config, registry);
			await audit(event, verdict, permission.sessionID);
			if (verdict.type === "ask") {
				askedCommands.add(shellAuditKey(permission.pattern, permission.sessionID));
			}

			switch (verdict.type) {
				case "deny":
					output.status = "deny";
					break;
				case "ask":
					output.status = "ask";
					break;
				case "no-opinion":
					break;
			}
		},

		/**
		 * Runs before every tool; throws to block execution.
		 * OpenCode cannot ask at this point, so a destructive find is only logged.
		 */
		"tool.execute.before": async (
			input: OpenCodeToolInput,
			output: OpenCodeToolOutput,
		): Promise<void> => {
			const event = toOpenCodeEvent(input.tool, output.args);
			const verdict = evaluateEvent(event, config, registry);
			const alreadyAudited =
				event.kind === "shell" &&
				askedCommands.delete(shellAuditKey(event.command, input.sessionID));
			if (!alreadyAudited) {
				await audit(event, verdict, input.sessionID);
			}

			if (verdict.type === "deny") {
				throw new Error(verdict.message);
			}

			if (verdict.type === "ask") {
				await log({ level: "warn", message: verdict.reason });
			}
		},
	};
}

// Default export for OpenCode plugin discovery
export const AgentHooks = createOpenCodePlugin;
