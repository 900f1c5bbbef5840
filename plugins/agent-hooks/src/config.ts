/**
 * Configuration system for agent-hooks
 * Reads from an optional JSON file and environment variables and provides defaults
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { Platform, PolicyConfig, PolicyOptions } from "./types.ts";

/** Every check off; the CLI turns them on with flags */
export const DEFAULT_POLICY: PolicyConfig = Object.freeze({
	blockRm: false,
	confirmDestructiveFind: false,
	denyRustAllow: false,
	allowExpect: false,
});

/** Shape of agent_hooks.json */
export const ConfigFileSchema = z
	.object({
		blockRm: z.boolean(),
		confirmDestructiveFind: z.boolean(),
		denyRustAllow: z.boolean(),
		allowExpect: z.boolean(),
		additionalContext: z.string(),
	})
	.partial();

/** Parse a boolean environment variable */
function parseBoolEnv(value: string | undefined): boolean | undefined {
	if (value === undefined || value === "") return undefined;
	return value === "1" || value.toLowerCase() === "true";
}

/** Parse a string environment variable, treating empty as unset */
function parseStringEnv(value: string | undefined): string | undefined {
	return value ? value : undefined;
}

/** Load policy options from environment variables */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PolicyOptions {
	return dropUndefined({
		blockRm: parseBoolEnv(env.AGENT_HOOKS_BLOCK_RM),
		confirmDestructiveFind: parseBoolEnv(
			env.AGENT_HOOKS_CONFIRM_DESTRUCTIVE_FIND,
		),
		denyRustAllow: parseBoolEnv(env.AGENT_HOOKS_DENY_RUST_ALLOW),
		allowExpect: parseBoolEnv(env.AGENT_HOOKS_ALLOW_EXPECT),
		additionalContext: parseStringEnv(env.AGENT_HOOKS_ADDITIONAL_CONTEXT),
	});
}

/**
 * Load policy options from a JSON file.
 * A missing file gives no options; an unreadable or invalid one is reported on stderr and ignored.
 */
export function loadConfigFile(path: string): PolicyOptions {
	if (!existsSync(path)) {
		return {};
	}

	try {
		const parsed = ConfigFileSchema.safeParse(
			JSON.parse(readFileSync(path, "utf-8")),
		);
		if (!parsed.success) {
			console.error(
				`[agent-hooks] Ignoring invalid config ${path}: ${parsed.error.message}`,
			);
			return {};
		}
		return dropUndefined(parsed.data);
	} catch (error) {
		console.error(`[agent-hooks] Could not read config ${path}:`, error);
		return {};
	}
}

/** Merge option sources, giving priority to earlier ones */
export function mergeConfig(...sources: PolicyOptions[]): PolicyOptions {
	const merged: PolicyOptions = {};
	for (const source of [...sources].reverse()) {
		Object.assign(merged, dropUndefined(source));
	}
	return merged;
}

/** Fill in defaults and freeze */
export function resolvePolicyConfig(options: PolicyOptions): PolicyConfig {
	return Object.freeze({
		blockRm: options.blockRm ?? DEFAULT_POLICY.blockRm,
		confirmDestructiveFind:
			options.confirmDestructiveFind ?? DEFAULT_POLICY.confirmDestructiveFind,
		denyRustAllow: options.denyRustAllow ?? DEFAULT_POLICY.denyRustAllow,
		allowExpect: options.allowExpect ?? DEFAULT_POLICY.allowExpect,
		additionalContext: options.additionalContext || undefined,
	});
}

/**
 * Build the policy for one invocation.
 * Priority: explicit options (CLI flags), then environment, then the file named by AGENT_HOOKS_CONFIG.
 */
export function loadConfig(
	options: PolicyOptions = {},
	env: NodeJS.ProcessEnv = process.env,
): PolicyConfig {
	const fileOptions = env.AGENT_HOOKS_CONFIG
		? loadConfigFile(env.AGENT_HOOKS_CONFIG)
		: {};
	return resolvePolicyConfig(
		mergeConfig(options, loadEnvConfig(env), fileOptions),
	);
}

/** Platform override from AGENT_HOOKS_PLATFORM, if any */
export function platformOverride(
	env: NodeJS.ProcessEnv = process.env,
): Platform | undefined {
	const value = env.AGENT_HOOKS_PLATFORM?.toLowerCase();
	return value === "windows" || value === "posix" ? value : undefined;
}

/** Audit logging is opt-in */
export function isAuditEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
	return parseBoolEnv(env.AGENT_HOOKS_AUDIT) ?? false;
}

/** Audit log directory from AGENT_HOOKS_AUDIT_DIR, if set */
export function auditDirOverride(
	env: NodeJS.ProcessEnv = process.env,
): string | undefined {
	return parseStringEnv(env.AGENT_HOOKS_AUDIT_DIR);
}

/** Debug output on stderr is opt-in */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
	return parseBoolEnv(env.AGENT_HOOKS_DEBUG) ?? false;
}

function dropUndefined(options: PolicyOptions): PolicyOptions {
	const result: PolicyOptions = {};
	if (options.blockRm !== undefined) result.blockRm = options.blockRm;
	if (options.confirmDestructiveFind !== undefined)
		result.confirmDestructiveFind = options.confirmDestructiveFind;
	if (options.denyRustAllow !== undefined)
		result.denyRustAllow = options.denyRustAllow;
	if (options.allowExpect !== undefined)
		result.allowExpect = options.allowExpect;
	if (options.additionalContext !== undefined)
		result.additionalContext = options.additionalContext;
	return result;
}
