#!/usr/bin/env node

/**
 * EduHub CLI - collection setup, seeding and reporting queries
 */

import { Command, Option } from "commander";
import { createInitCommand } from "./commands/init.js";
import { createSeedCommand } from "./commands/seed.js";
import { createGenerateCommand } from "./commands/generate.js";
import { createQueryCommand } from "./commands/query.js";
import { createIndexesCommand } from "./commands/indexes.js";
import { LOG_LEVELS, isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "eduhub",
  version: "0.1.0",
  description: "Data-access layer and tooling for the EduHub learning platform database",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .addOption(
      new Option("--log-level <level>", "Logging verbosity")
        .choices([...LOG_LEVELS])
        .default(logger.getLevel()),
    )
    .option("--uri <uri>", "MongoDB connection URI")
    .option("--db <name>", "Database name")
    .option("--schemas <path>", "Path to schema_validation.json")
    .option("--data <path>", "Path to the sample data JSON file");

  // Apply the log level before any command runs
  program.hook("preAction", (thisCommand) => {
    const level: unknown = thisCommand.opts().logLevel;
    if (isLogLevel(level)) {
      logger.setLevel(level);
    }
  });

  program.addCommand(createInitCommand());
  program.addCommand(createSeedCommand());
  program.addCommand(createGenerateCommand());
  program.addCommand(createQueryCommand());
  program.addCommand(createIndexesCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
