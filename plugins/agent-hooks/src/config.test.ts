import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
	isAuditEnabled,
	loadConfig,
	loadConfigFile,
	loadEnvConfig,
	mergeConfig,
	platformOverride,
	resolvePolicyConfig,
} from "./config.ts";

describe("loadEnvConfig", () => {
	test("reads boolean and string variables", () => {
		expect(
			loadEnvConfig({
				AGENT_HOOKS_BLOCK_RM: "1",
				AGENT_HOOKS_ALLOW_EXPECT: "TRUE",
				AGENT_HOOKS_DENY_RUST_ALLOW: "0",
				AGENT_HOOKS_ADDITIONAL_CONTEXT: "Ask a maintainer.",
			}),
		).toEqual({
			blockRm: true,
			allowExpect: true,
			denyRustAllow: false,
			additionalContext: "Ask a maintainer.",
		});
	});

	test("unset and empty variables leave options out", () => {
		expect(loadEnvConfig({ AGENT_HOOKS_BLOCK_RM: "" })).toEqual({});
	});
});

describe("mergeConfig", () => {
	test("earlier sources win", () => {
		expect(
			mergeConfig(
				{ blockRm: false },
				{ blockRm: true, denyRustAllow: true },
				{ denyRustAllow: false, allowExpect: true },
			),
		).toEqual({ blockRm: false, denyRustAllow: true, allowExpect: true });
	});

	test("undefined does not override", () => {
		expect(mergeConfig({ blockRm: undefined }, { blockRm: true })).toEqual({
			blockRm: true,
		});
	});
});

describe("resolvePolicyConfig", () => {
	test("fills defaults and freezes", () => {
		const config = resolvePolicyConfig({ blockRm: true });
		expect(config).toEqual({
			blockRm: true,
			confirmDestructiveFind: false,
			denyRustAllow: false,
			allowExpect: false,
			additionalContext: undefined,
		});
		expect(Object.isFrozen(config)).toBe(true);
	});
});

describe("config files", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "agent-hooks-config-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	test("missing file gives no options", () => {
		expect(loadConfigFile(join(dir, "agent_hooks.json"))).toEqual({});
	});

	test("reads a valid file", () => {
		const path = join(dir, "agent_hooks.json");
		writeFileSync(
			path,
			JSON.stringify({ allowExpect: true, additionalContext: "See docs." }),
		);
		expect(loadConfigFile(path)).toEqual({
			allowExpect: true,
			additionalContext: "See docs.",
		});
	});

	test("ignores an invalid file with a warning", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const path = join(dir, "agent_hooks.json");
		writeFileSync(path, JSON.stringify({ allowExpect: "yes" }));

		expect(loadConfigFile(path)).toEqual({});
		expect(error).toHaveBeenCalledTimes(1);
	});

	test("ignores a file that is not JSON", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const path = join(dir, "agent_hooks.json");
		writeFileSync(path, "{ allowExpect: true");

		expect(loadConfigFile(path)).toEqual({});
		expect(error).toHaveBeenCalledTimes(1);
	});

	test("flags override env, env overrides the file", () => {
		const path = join(dir, "agent_hooks.json");
		writeFileSync(
			path,
			JSON.stringify({
				blockRm: false,
				denyRustAllow: true,
				additionalContext: "from file",
			}),
		);

		const config = loadConfig(
			{ additionalContext: "from flag" },
			{ AGENT_HOOKS_CONFIG: path, AGENT_HOOKS_BLOCK_RM: "1" },
		);

		expect(config).toEqual({
			blockRm: true,
			confirmDestructiveFind: false,
			denyRustAllow: true,
			allowExpect: false,
			additionalContext: "from flag",
		});
	});
});

describe("environment switches", () => {
	test("platform override", () => {
		expect(platformOverride({ AGENT_HOOKS_PLATFORM: "Windows" })).toBe("windows");
		expect(platformOverride({ AGENT_HOOKS_PLATFORM: "posix" })).toBe("posix");
		expect(platformOverride({ AGENT_HOOKS_PLATFORM: "beos" })).toBeUndefined();
		expect(platformOverride({})).toBeUndefined();
	});

	test("audit is off unless enabled", () => {
		expect(isAuditEnabled({})).toBe(false);
		expect(isAuditEnabled({ AGENT_HOOKS_AUDIT: "1" })).toBe(true);
	});
});
