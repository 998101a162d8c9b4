/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  CONFIG_FILE_NAME,
  formatHelp,
  parseArgs,
  runCli,
  type CliEnvironment,
} from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export * from "./literals.js";
export { listClasses } from "./commands/classes.js";
export { describeClass } from "./commands/describe.js";
export { invokeMethod } from "./commands/invoke.js";
export { evalOperator } from "./commands/eval.js";
