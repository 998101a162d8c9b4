/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

// "-", "-5", "-2.5" are operands, not options
const isOption = (arg: string): boolean =>
  arg.startsWith("-") && arg !== "-" && !/^-[\d.]/.test(arg);

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const positionals: string[] = [];
  let onlyPositionals = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Everything after "--" is an operand
    if (arg === "--" && !onlyPositionals) {
      onlyPositionals = true;
      continue;
    }

    if (onlyPositionals || !isOption(arg)) {
      if (!command) {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", positionals: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", positionals: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      default:
        // Unknown options are operands (e.g. "--x" as a string literal)
        if (!command) {
          command = arg;
        } else {
          positionals.push(arg);
        }
    }
  }

  return { command, positionals, options };
};
