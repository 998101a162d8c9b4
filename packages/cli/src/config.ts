/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import type { Result } from "@metareflect/reflection";
import { CONFIG_FILE_NAME } from "./cli/constants.js";
import type { CliOptions, MetareflectConfig, ResolvedConfig } from "./types.js";

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Check the shape of a parsed metareflect.json.
 */
export const validateConfig = (
  value: unknown
): Result<MetareflectConfig, string> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const modules = "modules" in value ? value.modules : undefined;
  if (modules === undefined) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: 'modules' is required` };
  }
  if (!isStringArray(modules)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'modules' must be an array of strings`,
    };
  }

  const verbose = "verbose" in value ? value.verbose : undefined;
  if (verbose !== undefined && typeof verbose !== "boolean") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'verbose' must be a boolean`,
    };
  }

  const schema = "$schema" in value ? value.$schema : undefined;
  return {
    ok: true,
    value: {
      ...(typeof schema === "string" ? { $schema: schema } : {}),
      modules,
      ...(verbose !== undefined ? { verbose } : {}),
    },
  };
};

/**
 * Load metareflect.json
 */
export const loadConfig = (
  configPath: string
): Result<MetareflectConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find metareflect.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing metareflect.json; module paths are relative to it
 */
export const resolveConfig = (
  config: MetareflectConfig,
  cliOptions: CliOptions,
  projectRoot: string
): ResolvedConfig => {
  const quiet = cliOptions.quiet ?? false;
  return {
    projectRoot,
    modules: config.modules.map((modulePath) => resolve(projectRoot, modulePath)),
    // --quiet wins over a verbose config
    verbose: quiet ? false : (cliOptions.verbose ?? config.verbose ?? false),
    quiet,
  };
};
