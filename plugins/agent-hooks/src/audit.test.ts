import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { buildAuditEntry, writeAuditLog } from "./audit.ts";

const now = new Date("2026-01-02T03:04:05.000Z");

describe("buildAuditEntry", () => {
	test("no entry for no opinion", () => {
		expect(
			buildAuditEntry({ kind: "shell", command: "ls" }, { type: "no-opinion" }),
		).toBeNull();
	});

	test("records a denied command with secrets redacted", () => {
		expect(
			buildAuditEntry(
				{ kind: "shell", command: "mysql --password=hunter2hunter2 db" },
				{ type: "deny", message: "blocked" },
				"session-1",
				"/repo",
				now,
			),
		).toEqual({
			timestamp: "2026-01-02T03:04:05.000Z",
			sessionId: "session-1",
			cwd: "/repo",
			tool: "shell",
			subject: "mysql --pass[REDACTED] db",
			decision: "deny",
			reason: "blocked",
		});
	});

	test("records the path of an edited file", () => {
		const entry = buildAuditEntry(
			{ kind: "edit", filePath: "src/main.rs", newString: "#[allow(x)]" },
			{ type: "ask", reason: "confirm" },
			undefined,
			undefined,
			now,
		);
		expect(entry?.subject).toBe("src/main.rs");
		expect(entry?.decision).toBe("ask");
		expect(entry?.reason).toBe("confirm");
	});

	test("truncates long subjects", () => {
		const command = `rm ${"a".repeat(300)}`;
		const entry = buildAuditEntry(
			{ kind: "shell", command },
			{ type: "deny", message: "blocked" },
		);
		expect(entry?.subject).toBe(command);
		expect(entry?.truncatedSubject).toBe(`${command.slice(0, 200)}... [truncated]`);
	});
});

describe("writeAuditLog", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "agent-hooks-audit-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	test("appends one JSON line per verdict", async () => {
		const event = { kind: "shell", command: "rm -rf build" } as const;
		await writeAuditLog(event, { type: "deny", message: "blocked" }, "s/1", "/repo", dir);
		await writeAuditLog(event, { type: "deny", message: "again" }, "s/1", "/repo", dir);

		const lines = readFileSync(join(dir, "s_1.jsonl"), "utf-8").trim().split("\n");
		expect(lines).toHaveLength(2);
		expect(JSON.parse(lines[1] ?? "")).toMatchObject({
			tool: "shell",
			subject: "rm -rf build",
			decision: "deny",
			reason: "again",
		});
	});
});
