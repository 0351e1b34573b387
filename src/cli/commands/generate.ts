/**
 * Generate CLI command - write a seeded sample dataset as JSON
 */

import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { SampleDataGenerator, serializeDataset } from "../../lib/generator/sample-data.js";
import type { DatasetCounts } from "../../lib/generator/types.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { generateRandomSeed } from "../../utils/seed-manager.js";
import { loadConfig } from "../config/parser.js";
import type { GlobalCommandOptions } from "../config/types.js";
import { exitWithError, parseInteger } from "./shared.js";

interface GenerateCommandOptions extends GlobalCommandOptions, Partial<DatasetCounts> {
  seed?: string;
  outputPath?: string;
}

export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate a sample dataset for seeding")
    .option("--seed <seed>", "Seed for deterministic generation")
    .option("--users <number>", "Number of users", parseInteger)
    .option("--courses <number>", "Number of courses", parseInteger)
    .option("--lessons-per-course <number>", "Lessons per course", parseInteger)
    .option("--assignments-per-course <number>", "Assignments per course", parseInteger)
    .option("--enrollments-per-student <number>", "Courses each student enrolls in", parseInteger)
    .option(
      "--output-path <path>",
      'Output file, "stdout", or omitted for the configured sample data path',
    )
    .action(async (_options: GenerateCommandOptions, command: Command) => {
      try {
        const options = command.optsWithGlobals<GenerateCommandOptions>();
        const config = loadConfig(options);

        // Log the seed so a random run can be reproduced
        const seed = options.seed ?? generateRandomSeed();
        logger.info("Generating sample dataset", { seed });

        const generator = new SampleDataGenerator({ seed });
        const dataset = generator.generateDataset({
          users: options.users,
          courses: options.courses,
          lessonsPerCourse: options.lessonsPerCourse,
          assignmentsPerCourse: options.assignmentsPerCourse,
          enrollmentsPerStudent: options.enrollmentsPerStudent,
        });
        const output = serializeDataset(dataset);

        const outputPath = options.outputPath ?? config.paths.sampleData;
        if (outputPath === "stdout") {
          process.stdout.write(output);
          return;
        }

        try {
          await mkdir(dirname(outputPath), { recursive: true });
          await writeFile(outputPath, output, "utf8");
        } catch (error) {
          throw new FileIOError(`Failed to write dataset to ${outputPath}`, undefined, {
            cause: error,
          });
        }
        logger.info(`Sample dataset written to: ${outputPath}`);
      } catch (error) {
        exitWithError(error, "generate");
      }
    });
}
