/**
 * Init CLI command - create collections with validators and indexes
 */

import { Command } from "commander";
import { buildCollections, resetDatabase, setupIndexes } from "../../lib/database/setup.js";
import { loadValidationSchemas } from "../../lib/schema/schema-loader.js";
import { loadConfig } from "../config/parser.js";
import type { GlobalCommandOptions } from "../config/types.js";
import { exitWithError, printJson, withDatabase } from "./shared.js";

interface InitCommandOptions extends GlobalCommandOptions {
  keepExisting: boolean;
}

export function createInitCommand(): Command {
  return new Command("init")
    .description("Create the platform collections with their validators and indexes")
    .option("--keep-existing", "Do not drop existing collections first", false)
    .action(async (_options: InitCommandOptions, command: Command) => {
      try {
        const options = command.optsWithGlobals<InitCommandOptions>();
        const config = loadConfig(options);
        const validators = await loadValidationSchemas(config.paths.schemas);

        const result = await withDatabase(config, async (db) => {
          const dropped = options.keepExisting ? [] : await resetDatabase(db);
          const created = await buildCollections(db, validators);
          const indexed = await setupIndexes(db);
          return { dropped, created, indexed };
        });

        printJson({ status: "success", phase: "init", ...result });
      } catch (error) {
        exitWithError(error, "init");
      }
    });
}
