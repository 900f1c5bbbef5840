/**
 * Command-line interface
 * Parses arguments and dispatches to the Claude Code adapter or direct analysis
 */

import { runClaudeAdapter, type ClaudeHookMode } from "./adapters/claude.ts";
import { loadConfig, platformOverride } from "./config.ts";
import { getPatternRegistry } from "./patterns.ts";
import { evaluateShellCommand } from "./policy.ts";
import type { PolicyOptions } from "./types.ts";

export const VERSION = "0.1.0";

/** Parsed command line */
export type CliCommand =
	| { kind: "help" }
	| { kind: "version" }
	| { kind: "hook"; mode: ClaudeHookMode; options: PolicyOptions }
	| { kind: "check"; command: string }
	| { kind: "error"; message: string };

type BoolOption = Exclude<keyof PolicyOptions, "additionalContext">;

/** Boolean flags each hook subcommand accepts */
const BOOL_FLAGS: Record<ClaudeHookMode, Partial<Record<string, BoolOption>>> = {
	"permission-request": {
		"--block-rm": "blockRm",
		"--confirm-destructive-find": "confirmDestructiveFind",
	},
	"pre-tool-use": {
		"--deny-rust-allow": "denyRustAllow",
		"--expect": "allowExpect",
	},
};

const ADDITIONAL_CONTEXT = "--additional-context";

function isHookMode(value: string): value is ClaudeHookMode {
	return value === "permission-request" || value === "pre-tool-use";
}

/** Parse flags for a hook subcommand */
function parseHookFlags(mode: ClaudeHookMode, args: string[]): CliCommand {
	const options: PolicyOptions = {};
	const boolFlags = BOOL_FLAGS[mode];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";

		const key = boolFlags[arg];
		if (key) {
			options[key] = true;
			continue;
		}

		if (mode === "pre-tool-use" && arg.startsWith(`${ADDITIONAL_CONTEXT}=`)) {
			options.additionalContext = arg.slice(ADDITIONAL_CONTEXT.length + 1);
			continue;
		}

		if (mode === "pre-tool-use" && arg === ADDITIONAL_CONTEXT) {
			const value = args[i + 1];
			if (value === undefined) {
				return { kind: "error", message: `${ADDITIONAL_CONTEXT} requires a value` };
			}
			options.additionalContext = value;
			i++;
			continue;
		}

		return { kind: "error", message: `Unknown option for ${mode}: ${arg}` };
	}

	return { kind: "hook", mode, options };
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseCliArgs(args: string[]): CliCommand {
	const [first, ...rest] = args;

	if (first === undefined || first === "-h" || first === "--help" || first === "help") {
		return { kind: "help" };
	}

	if (first === "-v" || first === "--version") {
		return { kind: "version" };
	}

	if (first === "check") {
		const command = rest.join(" ");
		return command
			? { kind: "check", command }
			: { kind: "error", message: "check requires a command" };
	}

	if (isHookMode(first)) {
		return parseHookFlags(first, rest);
	}

	return { kind: "error", message: `Unknown command: ${first}` };
}

export const HELP_TEXT = `
agent-hooks - Guard AI coding agents against destructive commands and lint suppression

USAGE:
  agent-hooks <COMMAND> [OPTIONS]

COMMANDS:
  permission-request            Handle PermissionRequest hooks for Bash commands
      --block-rm                    Block rm and suggest trash instead
      --confirm-destructive-find    Ask for confirmation on destructive find commands
  pre-tool-use                  Handle PreToolUse hooks for Edit/Write tools
      --deny-rust-allow             Deny #[allow(...)] attributes in Rust files
      --expect                      With --deny-rust-allow: accept #[expect(...)] and suggest it instead
      --additional-context <TEXT>   With --deny-rust-allow: text appended to the denial reason
  check <COMMAND...>            Analyze a shell command and print the verdict

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version

ENVIRONMENT VARIABLES:
  AGENT_HOOKS_BLOCK_RM=1                   Same as --block-rm
  AGENT_HOOKS_CONFIRM_DESTRUCTIVE_FIND=1   Same as --confirm-destructive-find
  AGENT_HOOKS_DENY_RUST_ALLOW=1            Same as --deny-rust-allow
  AGENT_HOOKS_ALLOW_EXPECT=1               Same as --expect
  AGENT_HOOKS_ADDITIONAL_CONTEXT=<TEXT>    Same as --additional-context
  AGENT_HOOKS_CONFIG=<PATH>                JSON config file (agent_hooks.json)
  AGENT_HOOKS_PLATFORM=posix|windows       Override the command vocabulary
  AGENT_HOOKS_AUDIT=1                      Log deny/ask verdicts to ~/.agent-hooks/logs/
  AGENT_HOOKS_DEBUG=1                      Report ignored hook input on stderr

SETUP (Claude Code, ~/.claude/settings.json):
  {
    "hooks": {
      "PermissionRequest": [{
        "matcher": "Bash",
        "hooks": [{ "type": "command", "command": "agent-hooks permission-request --block-rm --confirm-destructive-find" }]
      }],
      "PreToolUse": [{
        "matcher": "Edit|Write",
        "hooks": [{ "type": "command", "command": "agent-hooks pre-tool-use --deny-rust-allow" }]
      }]
    }
  }
`;

/**
 * CLI entry point
 * Returns the process exit code
 */
export async function main(args: string[]): Promise<number> {
	const parsed = parseCliArgs(args);
	const registry = getPatternRegistry(platformOverride());

	switch (parsed.kind) {
		case "help":
			console.log(HELP_TEXT);
			return 0;

		case "version":
			console.log(`agent-hooks ${VERSION}`);
			return 0;

		case "error":
			console.error(`[agent-hooks] ${parsed.message}`);
			console.error(HELP_TEXT);
			return 1;

		case "check": {
			const config = loadConfig({ blockRm: true, confirmDestructiveFind: true });
			const verdict = evaluateShellCommand(parsed.command, config, registry);
			console.log(JSON.stringify(verdict, null, 2));
			return verdict.type === "deny" ? 1 : 0;
		}

		case "hook":
			await runClaudeAdapter(parsed.mode, loadConfig(parsed.options), registry);
			return 0;
	}
}
