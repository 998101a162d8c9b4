/**
 * CLI constants
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

export const CONFIG_FILE_NAME = "metareflect.json";

// Nearest package.json above this module, in sources and in dist/ alike
const findPackageJson = (startDir: string): string | undefined => {
  let currentDir = startDir;
  while (true) {
    const candidate = join(currentDir, "package.json");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
};

const readVersion = (): string => {
  const packageJsonPath = findPackageJson(
    dirname(fileURLToPath(import.meta.url))
  );
  if (packageJsonPath === undefined) {
    return "0.0.0";
  }
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
  return typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";
};

export const VERSION = readVersion();

/**
 * Exit codes returned by runCli
 */
export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_UNKNOWN_COMMAND = 2;
export const EXIT_NO_CONFIG = 3;
export const EXIT_LOOKUP_FAILED = 4;
export const EXIT_INVOCATION_FAILED = 5;
