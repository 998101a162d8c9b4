/**
 * Type definitions for CLI
 */

/**
 * Project configuration file (metareflect.json)
 */
export type MetareflectConfig = {
  readonly $schema?: string;
  /**
   * Modules that register classes when imported, relative to the config file.
   */
  readonly modules: readonly string[];
  readonly verbose?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing metareflect.json
  readonly modules: readonly string[]; // Absolute paths
  readonly verbose: boolean;
  readonly quiet: boolean;
};

export type ParsedArgs = {
  readonly command: string;
  readonly positionals: readonly string[];
  readonly options: CliOptions;
};

/**
 * Why a command failed; selects the exit code.
 */
export type CommandFailureKind = "usage" | "lookup" | "invocation";

export type CommandFailure = {
  readonly kind: CommandFailureKind;
  readonly message: string;
};
