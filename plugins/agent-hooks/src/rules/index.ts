/**
 * Rules module exports
 */

export { isDestructiveDelete } from "./delete.ts";
export { checkDestructiveFind } from "./find.ts";
