export { execute, executeSync } from "./execute.js";
export { formatExecutionResult } from "./formatExecutionResult.js";
