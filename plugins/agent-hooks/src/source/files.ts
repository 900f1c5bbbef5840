import { extname } from "node:path";

/** Check if a file path is a Rust source file (extension compared case-insensitively) */
export function isRustFile(filePath: string): boolean {
	return extname(filePath).toLowerCase() === ".rs";
}
