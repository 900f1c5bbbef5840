/**
 * Destructive find rule
 * Flags find invocations that delete or move what they match
 */

import { getPatternRegistry, type PatternRegistry } from "../patterns.ts";

/**
 * Check if a command is a destructive find.
 * Returns the description of the first matching idiom, or null when the command is safe.
 */
export function checkDestructiveFind(
	command: string,
	registry: PatternRegistry = getPatternRegistry(),
): string | null {
	if (!registry.findGate.test(command)) {
		return null;
	}

	const match = registry.destructiveFind.find(({ pattern }) =>
		pattern.test(command),
	);
	return match?.description ?? null;
}
