/**
 * Deletion command rule
 * Blocks rm (and del/rd/rmdir/Remove-Item on Windows) wherever it starts a command
 */

import { getPatternRegistry, type PatternRegistry } from "../patterns.ts";

/**
 * Check if a command runs rm or an equivalent.
 *
 * The verb must start a command (string start, or after `;`, `&`, `|`, `(`, `)`),
 * optionally behind `sudo`, `command`, a backslash escape or a path, and must be
 * followed by whitespace or the end of the string.
 */
export function isDestructiveDelete(
	command: string,
	registry: PatternRegistry = getPatternRegistry(),
): boolean {
	return registry.deleteCommand.test(command);
}
