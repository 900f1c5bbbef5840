/**
 * Decision policy
 * Combines rule results with the configured checks into one verdict per event
 */

import { getPatternRegistry, type PatternRegistry } from "./patterns.ts";
import { isDestructiveDelete } from "./rules/delete.ts";
import { checkDestructiveFind } from "./rules/find.ts";
import { detectSuppressionAttributes } from "./source/attributes.ts";
import { isRustFile } from "./source/files.ts";
import type {
	AttributeFinding,
	FileEvent,
	PolicyConfig,
	ToolEvent,
	Verdict,
} from "./types.ts";

export const RM_FORBIDDEN_MESSAGE =
	"rm is forbidden. Use trash command to delete files. Example: trash <path...>";

const FIX_INSTEAD =
	"Fix the underlying issue instead of suppressing the warning.";

const USE_EXPECT_INSTEAD =
	"Use #[expect(...)] instead, which will warn when the lint is no longer triggered.";

const STRICT_MESSAGES: Record<Exclude<AttributeFinding, "none">, string> = {
	allow: `Adding #[allow(...)] or #![allow(...)] attributes is not permitted. ${FIX_INSTEAD}`,
	expect: `Adding #[expect(...)] or #![expect(...)] attributes is not permitted. ${FIX_INSTEAD}`,
	both: `Adding #[allow(...)] or #[expect(...)] attributes is not permitted. ${FIX_INSTEAD}`,
};

const LENIENT_MESSAGE = `Adding #[allow(...)] or #![allow(...)] attributes is not permitted. ${USE_EXPECT_INSTEAD}`;

const NO_OPINION: Verdict = { type: "no-opinion" };

/** Reason shown when a destructive find needs confirmation */
export function destructiveFindReason(description: string): string {
	return `Destructive find command detected: ${description}. This operation may delete or modify files. Please confirm.`;
}

/**
 * Decide on a shell command.
 * The rm check wins over the find check when both are enabled and both match.
 */
export function evaluateShellCommand(
	command: string | undefined,
	config: PolicyConfig,
	registry: PatternRegistry = getPatternRegistry(),
): Verdict {
	if (!command) {
		return NO_OPINION;
	}

	if (config.blockRm && isDestructiveDelete(command, registry)) {
		return { type: "deny", message: RM_FORBIDDEN_MESSAGE };
	}

	if (config.confirmDestructiveFind) {
		const description = checkDestructiveFind(command, registry);
		if (description) {
			return { type: "ask", reason: destructiveFindReason(description) };
		}
	}

	return NO_OPINION;
}

/** Denial message for a finding, or null when the finding is acceptable */
function suppressionMessage(
	finding: AttributeFinding,
	allowExpect: boolean,
): string | null {
	if (finding === "none") {
		return null;
	}
	if (allowExpect) {
		return finding === "expect" ? null : LENIENT_MESSAGE;
	}
	return STRICT_MESSAGES[finding];
}

/** Content an edit or write puts into the file (replacement text preferred) */
export function fileEventContent(event: FileEvent): string {
	return event.newString ?? event.content ?? "";
}

/**
 * Decide on a file edit or write.
 * Only Rust files with non-empty new content are checked.
 */
export function evaluateFileEdit(
	event: FileEvent,
	config: PolicyConfig,
	registry: PatternRegistry = getPatternRegistry(),
): Verdict {
	if (!config.denyRustAllow) {
		return NO_OPINION;
	}

	if (!event.filePath || !isRustFile(event.filePath)) {
		return NO_OPINION;
	}

	const content = fileEventContent(event);
	if (!content) {
		return NO_OPINION;
	}

	const finding = detectSuppressionAttributes(content, registry);
	const message = suppressionMessage(finding, config.allowExpect);
	if (!message) {
		return NO_OPINION;
	}

	return {
		type: "deny",
		message: config.additionalContext
			? `${message} ${config.additionalContext}`
			: message,
	};
}

/**
 * Route an event to the flow for its tool kind
 */
export function evaluateEvent(
	event: ToolEvent,
	config: PolicyConfig,
	registry: PatternRegistry = getPatternRegistry(),
): Verdict {
	switch (event.kind) {
		case "shell":
			return evaluateShellCommand(event.command, config, registry);
		case "edit":
		case "write":
			return evaluateFileEdit(event, config, registry);
		case "other":
			return NO_OPINION;
		default: {
			const unreachable: never = event;
			return unreachable;
		}
	}
}
