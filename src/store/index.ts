export { SqliteStore, formatTimestamp, parseTimestamp } from "./sqlite-store.js";
export type { FulltextStore } from "./types.js";
