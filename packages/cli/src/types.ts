/**
 * Type definitions for CLI
 */

import type {
  DiagnosticsCollector,
  NullValueStrategy,
  UnmappedTargetPolicy,
} from "@mapweave/frontend";

/**
 * mapweave configuration file (mapweave.json)
 */
export type MapweaveConfig = {
  readonly $schema?: string;
  /** Where generated modules go, relative to the config file */
  readonly outputDirectory?: string;
  readonly nullValueStrategy?: NullValueStrategy;
  readonly unmappedTargetPolicy?: UnmappedTargetPolicy;
  readonly emit?: {
    readonly indent?: number;
    readonly header?: string;
  };
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  nullValueStrategy?: string;
  unmappedTargetPolicy?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Directory containing mapweave.json, or the working directory */
  readonly projectRoot: string;
  readonly sourceFile: string | undefined;
  /** Absolute; undefined writes next to the source file */
  readonly outputDirectory: string | undefined;
  readonly nullValueStrategy: NullValueStrategy | undefined;
  readonly unmappedTargetPolicy: UnmappedTargetPolicy | undefined;
  readonly indent: number;
  readonly header: string | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Why a command failed
 */
export type CommandFailure =
  | { readonly kind: "io"; readonly message: string }
  | { readonly kind: "diagnostics"; readonly diagnostics: DiagnosticsCollector };
