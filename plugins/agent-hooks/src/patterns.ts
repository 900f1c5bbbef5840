/**
 * Compiled pattern registry
 * Every regex the classifiers and the attribute detector use is built here,
 * once per platform, and handed to them by reference.
 */

import type { Platform } from "./types.ts";

/** A destructive find idiom and how it is reported */
export interface DestructivePattern {
	pattern: RegExp;
	description: string;
}

/** All compiled patterns for one platform */
export interface PatternRegistry {
	platform: Platform;
	deleteCommand: RegExp;
	findGate: RegExp;
	destructiveFind: readonly DestructivePattern[];
	/** Global: iterated with matchAll */
	allowAttribute: RegExp;
	/** Global: iterated with matchAll */
	expectAttribute: RegExp;
}

/** Command separator or start of string, as a prefix for command words */
const COMMAND_START = String.raw`(^|[;&|()]\s*)`;

const POSIX_DESTRUCTIVE_FIND: ReadonlyArray<[string, string]> = [
	[String.raw`find\s+.*-delete`, "find with -delete option"],
	[
		String.raw`find\s+.*-exec\s+(sudo\s+)?(rm|rmdir)\s`,
		"find with -exec rm/rmdir",
	],
	[
		String.raw`find\s+.*-execdir\s+(sudo\s+)?(rm|rmdir)\s`,
		"find with -execdir rm/rmdir",
	],
	[
		String.raw`find\s+.*\|\s*(sudo\s+)?xargs\s+(sudo\s+)?(rm|rmdir)`,
		"find piped to xargs rm/rmdir",
	],
	[String.raw`find\s+.*-exec\s+(sudo\s+)?mv\s`, "find with -exec mv"],
	[String.raw`find\s+.*-ok\s+(sudo\s+)?(rm|rmdir)\s`, "find with -ok rm/rmdir"],
];

const WINDOWS_DESTRUCTIVE_FIND: ReadonlyArray<[string, string]> = [
	[String.raw`\|\s*(move|move-item)\b`, "piped to move/move-item"],
];

function compileDestructive(
	entries: ReadonlyArray<[string, string]>,
): DestructivePattern[] {
	return entries.map(([source, description]) => ({
		pattern: new RegExp(source, "i"),
		description,
	}));
}

/**
 * Build the registry for a platform.
 * Throws if a pattern fails to compile, which only a broken edit to this file can cause.
 */
export function createPatternRegistry(platform: Platform): PatternRegistry {
	const shared = {
		allowAttribute: /#!?\[allow\s*\(/g,
		expectAttribute: /#!?\[expect\s*\(/g,
	};

	if (platform === "windows") {
		return {
			platform,
			deleteCommand: new RegExp(
				`${COMMAND_START}${String.raw`(sudo\s+)?(command\s+)?(\\)?(\S*[\\/])?(rm|del|rd|rmdir|remove-item)(\s|$)`}`,
				"i",
			),
			findGate: /\|/,
			destructiveFind: compileDestructive(WINDOWS_DESTRUCTIVE_FIND),
			...shared,
		};
	}

	return {
		platform,
		deleteCommand: new RegExp(
			`${COMMAND_START}${String.raw`(sudo\s+)?(command\s+)?(\\)?(\S*/)?rm(\s|$)`}`,
		),
		findGate: new RegExp(`${COMMAND_START}find\\s`),
		destructiveFind: compileDestructive(POSIX_DESTRUCTIVE_FIND),
		...shared,
	};
}

/** Platform of the running process */
export function hostPlatform(): Platform {
	return process.platform === "win32" ? "windows" : "posix";
}

const registries = new Map<Platform, PatternRegistry>();

/** Registry for a platform, built on first use and reused afterwards */
export function getPatternRegistry(
	platform: Platform = hostPlatform(),
): PatternRegistry {
	let registry = registries.get(platform);
	if (!registry) {
		registry = createPatternRegistry(platform);
		registries.set(platform, registry);
	}
	return registry;
}
