/**
 * Shared CLI utilities and helper functions.
 */

import type { Command } from "commander";
import { stringify } from "lossless-json";
import { LogLevel, setLogLevel } from "../utils/logger";
import type { GlobalOptions } from "./types";

/**
 * Traverses the command hierarchy to find the root command and returns its options.
 * This is useful for accessing global options from within any subcommand.
 * @param command The current command instance.
 * @returns The global options from the root command.
 */
export function getGlobalOptions(command?: Command): GlobalOptions {
  let rootCommand = command;
  while (rootCommand?.parent) {
    rootCommand = rootCommand.parent;
  }
  return rootCommand?.opts() || {};
}

/** Pretty-prints JSON; `bigint` fields such as `mtimeNs` are printed as integers. */
export const formatOutput = (data: unknown): string => stringify(data, undefined, 2) ?? "";

/**
 * Sets up logging based on global options
 */
export function setupLogging(options: GlobalOptions): void {
  if (options.silent) {
    setLogLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
}
