/**
 * Seed CLI command - load the sample dataset into the collections
 */

import { Command } from "commander";
import { seedDatabaseFromFiles } from "../../lib/database/setup.js";
import { loadConfig } from "../config/parser.js";
import type { GlobalCommandOptions } from "../config/types.js";
import { exitWithError, printJson, withDatabase } from "./shared.js";

export function createSeedCommand(): Command {
  return new Command("seed")
    .description("Seed the collections from the sample data file, converting date fields")
    .action(async (_options: GlobalCommandOptions, command: Command) => {
      try {
        const config = loadConfig(command.optsWithGlobals<GlobalCommandOptions>());

        const summary = await withDatabase(config, (db) =>
          seedDatabaseFromFiles(db, config.paths.schemas, config.paths.sampleData),
        );

        printJson({ status: "success", phase: "seed", ...summary });
      } catch (error) {
        exitWithError(error, "seed");
      }
    });
}
