export * from "./schema.js";
export { getDb, closeDb, type Db } from "./client.js";
export { DrizzleRunStore, toRunRow, fromRunRow } from "./run-store.js";
