/**
 * CLI - Public API
 */

export { VERSION, CONFIG_FILE_NAME } from "./constants.js";
export { formatHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export { runCli, type CliEnvironment } from "./dispatcher.js";
