/**
 * Lint-suppression attribute detection
 * Finds #[allow(...)] / #[expect(...)] and their inner #! forms outside comments and strings
 */

import { getPatternRegistry, type PatternRegistry } from "../patterns.ts";
import type { AttributeFinding } from "../types.ts";
import { isExcludedPosition } from "./scanner.ts";

/** At least one match of `pattern` starts outside comments and strings */
function hasRealMatch(content: string, pattern: RegExp): boolean {
	for (const match of content.matchAll(pattern)) {
		if (!isExcludedPosition(content, match.index ?? 0)) {
			return true;
		}
	}
	return false;
}

/**
 * Check content for #[allow(...)] or #[expect(...)] attributes.
 * Does not check the file type; callers gate on `isRustFile` first.
 */
export function detectSuppressionAttributes(
	content: string,
	registry: PatternRegistry = getPatternRegistry(),
): AttributeFinding {
	if (!content) {
		return "none";
	}

	const hasAllow = hasRealMatch(content, registry.allowAttribute);
	const hasExpect = hasRealMatch(content, registry.expectAttribute);

	if (hasAllow && hasExpect) return "both";
	if (hasAllow) return "allow";
	if (hasExpect) return "expect";
	return "none";
}
