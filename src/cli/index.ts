/**
 * Main CLI setup and command registration.
 */

import { Command, Option } from "commander";
import { createFetchCommand } from "./commands/fetch";
import { createStateCommand } from "./commands/state";
import { setupLogging } from "./utils";

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createCliProgram(): Command {
  const program = new Command();

  program
    .name("repodata-cache")
    .description("Conditional-fetch cache for channel index documents.")
    .version(__APP_VERSION__)
    // Mutually exclusive logging flags
    .addOption(
      new Option("--verbose", "Enable verbose (debug) logging").conflicts("silent"),
    )
    .addOption(new Option("--silent", "Disable all logging except errors"))
    .addOption(
      new Option("--cache-dir <path>", "Directory for cached documents").env(
        "REPODATA_CACHE_DIR",
      ),
    )
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .showHelpAfterError(true);

  program.hook("preAction", (thisCommand) => {
    setupLogging(thisCommand.opts());
  });

  createFetchCommand(program);
  createStateCommand(program);

  return program;
}
