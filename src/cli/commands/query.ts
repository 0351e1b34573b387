/**
 * Query CLI command - run a named query from the catalog and print JSON
 */

import { Command } from "commander";
import { getCollections } from "../../lib/database/collections.js";
import { QUERY_CATALOG, runCatalogQuery } from "../../lib/queries/catalog.js";
import type { CatalogQueryArgs } from "../../lib/queries/types.js";
import { loadConfig } from "../config/parser.js";
import type { GlobalCommandOptions } from "../config/types.js";
import {
  exitWithError,
  parseInteger,
  parseList,
  parseNumber,
  printJson,
  withDatabase,
} from "./shared.js";

interface QueryCommandOptions extends GlobalCommandOptions, CatalogQueryArgs {}

function describeCatalog(): string {
  return Object.entries(QUERY_CATALOG)
    .map(([name, query]) => `  ${name.padEnd(30)}${query.description}`)
    .join("\n");
}

export function createQueryCommand(): Command {
  return new Command("query")
    .description("Run a named query and print the result as JSON")
    .argument("<name>", "Query name (see --help for the catalog)")
    .option("--category <category>", "Course category")
    .option("--course-id <id>", "Course id")
    .option("--title <text>", "Course title fragment")
    .option("--min-price <price>", "Minimum course price", parseNumber)
    .option("--max-price <price>", "Maximum course price", parseNumber)
    .option("--months <number>", "Signup window in months", parseInteger)
    .option("--weeks <number>", "Due-date window in weeks", parseInteger)
    .option("--tags <tags>", "Comma-separated course tags", parseList)
    .option("--limit <number>", "Maximum rows for ranked queries", parseInteger)
    .addHelpText("after", `\nQueries:\n${describeCatalog()}`)
    .action(async (name: string, _options: QueryCommandOptions, command: Command) => {
      try {
        const options = command.optsWithGlobals<QueryCommandOptions>();
        const config = loadConfig(options);
        const args: CatalogQueryArgs = {
          category: options.category,
          courseId: options.courseId,
          title: options.title,
          minPrice: options.minPrice,
          maxPrice: options.maxPrice,
          months: options.months,
          weeks: options.weeks,
          tags: options.tags,
          limit: options.limit,
        };

        const result = await withDatabase(config, (db) =>
          runCatalogQuery(getCollections(db), name, args),
        );

        printJson(result);
      } catch (error) {
        exitWithError(error, "query");
      }
    });
}
