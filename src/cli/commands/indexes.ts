import { Command } from "commander";
import { setupIndexes } from "../../lib/database/setup.js";
import { EduHubError, ErrorCode } from "../../utils/errors.js";
import { loadConfig } from "../config/parser.js";
import type { GlobalCommandOptions } from "../config/types.js";
import { exitWithError, printJson, withDatabase } from "./shared.js";

export function createIndexesCommand(): Command {
  return new Command("indexes")
    .description("Create the indexes used by the query catalog")
    .action(async (_options: GlobalCommandOptions, command: Command) => {
      try {
        const config = loadConfig(command.optsWithGlobals<GlobalCommandOptions>());
        const created = await withDatabase(config, setupIndexes);

        if (!created) {
          throw new EduHubError(ErrorCode.SETUP_ERROR, "Index creation failed; see log");
        }
        printJson({ status: "success", phase: "indexes" });
      } catch (error) {
        exitWithError(error, "indexes");
      }
    });
}
