/**
 * CLI command dispatcher
 */

import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  reflection,
  type ClassRegistry,
  type Result,
} from "@metareflect/reflection";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { listClasses } from "../commands/classes.js";
import { describeClass } from "../commands/describe.js";
import { evalOperator } from "../commands/eval.js";
import { invokeMethod } from "../commands/invoke.js";
import type { CliOptions, CommandFailure } from "../types.js";
import {
  CONFIG_FILE_NAME,
  EXIT_ERROR,
  EXIT_INVOCATION_FAILED,
  EXIT_LOOKUP_FAILED,
  EXIT_NO_CONFIG,
  EXIT_OK,
  EXIT_UNKNOWN_COMMAND,
  VERSION,
} from "./constants.js";
import { formatHelp } from "./help.js";
import { parseArgs } from "./parser.js";

export type CliEnvironment = {
  readonly registry: ClassRegistry;
  readonly cwd: string;
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
};

/**
 * A class module may export `register`, called with the registry the CLI
 * is working on. Modules without it register into the default registry
 * as a side effect of being imported.
 */
type ClassModule = {
  readonly register: (registry: ClassRegistry) => void;
};

const isClassModule = (value: unknown): value is ClassModule =>
  typeof value === "object" &&
  value !== null &&
  "register" in value &&
  typeof value.register === "function";

const REGISTRY_COMMANDS = new Set(["classes", "describe", "invoke"]);

const EXIT_CODES: Readonly<Record<CommandFailure["kind"], number>> = {
  usage: EXIT_ERROR,
  lookup: EXIT_LOOKUP_FAILED,
  invocation: EXIT_INVOCATION_FAILED,
};

const report = (
  env: CliEnvironment,
  result: Result<string, CommandFailure>
): number => {
  if (!result.ok) {
    env.err(`Error: ${result.error.message}`);
    return EXIT_CODES[result.error.kind];
  }
  env.out(result.value);
  return EXIT_OK;
};

/**
 * Import the configured class modules, then seal the registry.
 * Without a config only the built-in classes are available.
 */
const loadClasses = async (
  env: CliEnvironment,
  options: CliOptions
): Promise<number> => {
  const configPath = options.config
    ? resolve(env.cwd, options.config)
    : findConfig(env.cwd);

  if (configPath !== null && options.config && !existsSync(configPath)) {
    env.err(`Error: Config file not found: ${configPath}`);
    return EXIT_NO_CONFIG;
  }

  if (configPath === null) {
    if (options.verbose && !options.quiet) {
      env.out(`[CLI] No ${CONFIG_FILE_NAME} found; built-in classes only`);
    }
    env.registry.seal();
    return EXIT_OK;
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    env.err(`Error: ${configResult.error}`);
    return EXIT_ERROR;
  }

  // Project root is the directory containing metareflect.json
  const config = resolveConfig(configResult.value, options, dirname(configPath));

  for (const modulePath of config.modules) {
    if (config.verbose) {
      env.out(`[CLI] Loading ${modulePath}`);
    }
    try {
      const loaded: unknown = await import(pathToFileURL(modulePath).href);
      if (isClassModule(loaded)) {
        loaded.register(env.registry);
      }
    } catch (error) {
      env.err(
        `Error: Failed to load ${modulePath}: ${error instanceof Error ? error.message : String(error)}`
      );
      return EXIT_ERROR;
    }
  }

  env.registry.seal();
  if (config.verbose) {
    env.out(
      `[CLI] ${env.registry.getClassNames().length} classes registered`
    );
  }
  return EXIT_OK;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  environment: Partial<CliEnvironment> = {}
): Promise<number> => {
  const env: CliEnvironment = {
    registry: environment.registry ?? reflection,
    cwd: environment.cwd ?? process.cwd(),
    out: environment.out ?? ((line) => console.log(line)),
    err: environment.err ?? ((line) => console.error(line)),
  };
  const parsed = parseArgs(args);
  const [first, second, ...rest] = parsed.positionals;

  if (parsed.command === "version") {
    env.out(`metareflect v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    env.out(formatHelp());
    return EXIT_OK;
  }

  if (parsed.command === "eval") {
    if (first === undefined) {
      env.err("Error: Operator required");
      env.err("Usage: metareflect eval <operator> <a> [b]");
      return EXIT_ERROR;
    }
    return report(env, evalOperator(first, parsed.positionals.slice(1)));
  }

  if (!REGISTRY_COMMANDS.has(parsed.command)) {
    env.err(`Error: Unknown command '${parsed.command}'`);
    env.err("Run 'metareflect --help' for usage information");
    return EXIT_UNKNOWN_COMMAND;
  }

  const loaded = await loadClasses(env, parsed.options);
  if (loaded !== EXIT_OK) {
    return loaded;
  }

  switch (parsed.command) {
    case "classes":
      env.out(listClasses(env.registry));
      return EXIT_OK;

    case "describe":
      if (first === undefined) {
        env.err("Error: Class name required");
        env.err("Usage: metareflect describe <class>");
        return EXIT_ERROR;
      }
      return report(env, describeClass(env.registry, first));

    default:
      if (first === undefined || second === undefined) {
        env.err("Error: Class and method names required");
        env.err("Usage: metareflect invoke <class> <method> [args...]");
        return EXIT_ERROR;
      }
      return report(env, invokeMethod(env.registry, first, second, rest));
  }
};
