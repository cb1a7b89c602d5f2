/**
 * Test helpers for ordtab
 */

export { createTempDir, removeDir, withTempDatabase, withTempDir } from "./fs.js";
export { FlakyStore, type FailurePredicate } from "./flaky.js";
export { bytes, collect, text } from "./iterate.js";
