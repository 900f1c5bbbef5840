import { describe, expect, test } from "vitest";
import { isExcludedPosition } from "./scanner.ts";

/** Offset of the first occurrence of `needle`, failing loudly if absent */
function offsetOf(content: string, needle: string): number {
	const index = content.indexOf(needle);
	expect(index).toBeGreaterThanOrEqual(0);
	return index;
}

describe("isExcludedPosition", () => {
	describe("comments", () => {
		test("inside a line comment", () => {
			expect(isExcludedPosition("// #[allow(dead_code)]", 3)).toBe(true);
		});

		test("on the line after a line comment", () => {
			const content = "// comment\n#[allow(dead_code)]";
			expect(isExcludedPosition(content, 11)).toBe(false);
		});

		test("inside an open block comment", () => {
			expect(isExcludedPosition("/* #[allow(dead_code)] */", 3)).toBe(true);
		});

		test("after a closed block comment", () => {
			const content = "/* note */ #[allow(dead_code)]";
			expect(isExcludedPosition(content, offsetOf(content, "#["))).toBe(false);
		});
	});

	describe("string literals", () => {
		test("inside an unterminated string", () => {
			const content = 'let s = "#[allow(dead_code)]";';
			expect(isExcludedPosition(content, 9)).toBe(true);
		});

		test("after a closed string", () => {
			const content = 'let a = "x"; #[allow(y)]';
			expect(isExcludedPosition(content, offsetOf(content, "#["))).toBe(false);
		});

		test("inside the second of two strings", () => {
			const content = 'let a = "x"; let b = "#[allow(y)]";';
			expect(isExcludedPosition(content, offsetOf(content, "#["))).toBe(true);
		});

		test("an escaped quote does not close the string", () => {
			const content = 'let s = "a\\"#[allow(x)]";';
			expect(isExcludedPosition(content, offsetOf(content, "#["))).toBe(true);
		});
	});

	describe("raw strings", () => {
		test("inside a raw string", () => {
			const content = 'let s = r#"#[allow(x)]"#;';
			expect(isExcludedPosition(content, 11)).toBe(true);
		});

		test("inside a raw string without hashes", () => {
			const content = 'let s = r"#[allow(x)]";';
			expect(isExcludedPosition(content, offsetOf(content, "#["))).toBe(true);
		});

		test("after a closed raw string", () => {
			const content = 'let s = r#"x"#;\n#[allow(y)]';
			expect(isExcludedPosition(content, offsetOf(content, "#[allow"))).toBe(
				false,
			);
		});

		test("known limitation: any quote closes a raw string", () => {
			// In Rust the quote before #[ does not end an r##"…"## string, so this
			// position is really inside the literal. The scanner ignores hash counts.
			const content = 'let a = r##"quote: "#[allow(x)]"##;';
			expect(isExcludedPosition(content, offsetOf(content, "#[allow"))).toBe(
				false,
			);
		});
	});

	describe("known limitation: comment markers inside strings", () => {
		test("a // inside a string on the same line counts as a comment", () => {
			const content = 'let url = "http://x"; #[allow(y)]';
			expect(isExcludedPosition(content, offsetOf(content, "#["))).toBe(true);
		});
	});

	describe("edge cases", () => {
		test("empty buffer", () => {
			expect(isExcludedPosition("", 0)).toBe(false);
		});

		test("offset 0 has no prefix", () => {
			expect(isExcludedPosition("// #[allow(x)]", 0)).toBe(false);
		});

		test("same answer on repeated calls", () => {
			const content = 'let s = r#"#[allow(x)]"#;\n// c\n#[allow(y)]';
			const offsets = [0, 11, offsetOf(content, "// c"), content.length];
			const first = offsets.map((o) => isExcludedPosition(content, o));
			const second = offsets.map((o) => isExcludedPosition(content, o));
			expect(second).toEqual(first);
		});
	});
});
