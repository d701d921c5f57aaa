export { SQLiteMemoryStore, encodePayload } from "./memory-store.js";
export type { SQLiteMemoryStoreOptions } from "./memory-store.js";
