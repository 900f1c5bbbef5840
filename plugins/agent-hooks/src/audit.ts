/**
 * Audit logging for agent-hooks
 * Appends deny and ask verdicts to ~/.agent-hooks/logs/<session>.jsonl when enabled
 */

import { appendFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { auditDirOverride } from "./config.ts";
import { fileEventContent } from "./policy.ts";
import type { AuditEntry, ToolEvent, Verdict } from "./types.ts";
import { redactSecrets, sanitizeFilename, truncate } from "./utils.ts";

/** Default directory for audit logs; AGENT_HOOKS_AUDIT_DIR overrides it */
const AUDIT_DIR = join(homedir(), ".agent-hooks", "logs");

/** What the verdict was about: the command, or the path of the edited file */
function eventSubject(event: ToolEvent): string {
	switch (event.kind) {
		case "shell":
			return event.command ?? "";
		case "edit":
		case "write":
			return event.filePath ?? truncate(fileEventContent(event));
		case "other":
			return event.toolName;
	}
}

/**
 * Build the audit entry for a verdict, or null for no-opinion
 */
export function buildAuditEntry(
	event: ToolEvent,
	verdict: Verdict,
	sessionId?: string,
	cwd?: string,
	now: Date = new Date(),
): AuditEntry | null {
	if (verdict.type === "no-opinion") {
		return null;
	}

	const subject = redactSecrets(eventSubject(event));
	const truncated = truncate(subject);

	return {
		timestamp: now.toISOString(),
		sessionId,
		cwd,
		tool: event.kind,
		subject,
		truncatedSubject: truncated === subject ? undefined : truncated,
		decision: verdict.type,
		reason: verdict.type === "deny" ? verdict.message : verdict.reason,
	};
}

/**
 * Append an audit entry for a verdict.
 * Errors are reported on stderr and never change the verdict.
 */
export async function writeAuditLog(
	event: ToolEvent,
	verdict: Verdict,
	sessionId?: string,
	cwd?: string,
	dir: string = auditDirOverride() ?? AUDIT_DIR,
): Promise<void> {
	const entry = buildAuditEntry(event, verdict, sessionId, cwd);
	if (!entry) {
		return;
	}

	try {
		await mkdir(dir, { recursive: true, mode: 0o700 });

		const safeSessionId = sessionId ? sanitizeFilename(sessionId) : "unknown";
		const logFile = join(dir, `${safeSessionId}.jsonl`);

		await appendFile(logFile, `${JSON.stringify(entry)}\n`, { mode: 0o600 });
	} catch (error) {
		console.error("[agent-hooks] Audit log error:", error);
	}
}

