/**
 * External tool exports.
 * @module tools
 */

export { ToolExecutor } from "./executor.js";
export { listStagedFiles, parseNameOnly } from "./git.js";
