/**
 * Source text checks
 */

export { detectSuppressionAttributes } from "./attributes.ts";
export { isRustFile } from "./files.ts";
export { isExcludedPosition } from "./scanner.ts";
