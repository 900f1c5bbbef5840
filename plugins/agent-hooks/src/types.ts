/**
 * Core types for agent-hooks
 */

/** Verdict produced for one evaluated event */
export type Verdict =
	| { type: "no-opinion" }
	| { type: "deny"; message: string }
	| { type: "ask"; reason: string };

/** Platform whose command vocabulary the classifiers use */
export type Platform = "posix" | "windows";

/** Lint-suppression attributes found in a source buffer */
export type AttributeFinding = "none" | "allow" | "expect" | "both";

/** Shell command about to run */
export interface ShellEvent {
	kind: "shell";
	command?: string;
}

/** File edit or write about to happen */
export interface FileEvent {
	kind: "edit" | "write";
	filePath?: string;
	/** Replacement text (edit tools) */
	newString?: string;
	/** Full file content (write tools) */
	content?: string;
}

/** Any tool the hooks have no rules for */
export interface OtherEvent {
	kind: "other";
	toolName: string;
}

/** Tool invocation as seen by the policy */
export type ToolEvent = ShellEvent | FileEvent | OtherEvent;

/** Which checks run and how */
export interface PolicyConfig {
	blockRm: boolean;
	confirmDestructiveFind: boolean;
	denyRustAllow: boolean;
	/** Lenient mode: #[expect(...)] is accepted, only #[allow(...)] is denied */
	allowExpect: boolean;
	additionalContext?: string;
}

/** Partial config as read from one source (file, env, flags) */
export type PolicyOptions = Partial<PolicyConfig>;

/** Hook event names the Claude adapter answers */
export type ClaudeHookEventName = "PermissionRequest" | "PreToolUse";

/** Claude Code hook output format */
export interface ClaudeHookOutput {
	hookSpecificOutput: {
		hookEventName: ClaudeHookEventName;
		decision?: {
			behavior: "allow" | "deny";
			message: string;
		};
		permissionDecision?: "allow" | "deny" | "ask";
		permissionDecisionReason?: string;
	};
}

/** Audit log entry */
export interface AuditEntry {
	timestamp: string;
	sessionId?: string;
	cwd?: string;
	tool: ToolEvent["kind"];
	subject: string;
	truncatedSubject?: string;
	decision: Exclude<Verdict["type"], "no-opinion">;
	reason: string;
}
