/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { ShapeValidator } from "../../lib/validator/schema-validator.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import {
  DEFAULT_CONFIG,
  type EduHubConfig,
  type EduHubConfigFile,
  type GlobalCommandOptions,
} from "./types.js";

const configShape = new ShapeValidator<EduHubConfigFile>({
  type: "object",
  additionalProperties: false,
  properties: {
    mongo: {
      type: "object",
      additionalProperties: false,
      properties: {
        uri: { type: "string", minLength: 1 },
        database: { type: "string", minLength: 1 },
      },
    },
    paths: {
      type: "object",
      additionalProperties: false,
      properties: {
        schemas: { type: "string", minLength: 1 },
        sampleData: { type: "string", minLength: 1 },
      },
    },
  },
});

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): EduHubConfigFile {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // An empty YAML document parses to null
  const config = parsed ?? {};
  if (!configShape.validate(config)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, configShape.getErrors());
  }

  logger.info("Configuration file parsed successfully", {
    hasMongoConfig: !!config.mongo,
    hasPathsConfig: !!config.paths,
  });

  return config;
}

/**
 * Merge configuration sources.
 * Precedence: CLI flags > environment > config file > defaults
 */
export function resolveConfig(
  options: GlobalCommandOptions,
  configFile: EduHubConfigFile = {},
  env: NodeJS.ProcessEnv = process.env,
): EduHubConfig {
  return {
    mongo: {
      uri:
        options.uri ??
        env.EDUHUB_MONGO_URI ??
        configFile.mongo?.uri ??
        DEFAULT_CONFIG.mongo.uri,
      database:
        options.db ??
        env.EDUHUB_DB_NAME ??
        configFile.mongo?.database ??
        DEFAULT_CONFIG.mongo.database,
    },
    paths: {
      schemas: options.schemas ?? configFile.paths?.schemas ?? DEFAULT_CONFIG.paths.schemas,
      sampleData:
        options.data ?? configFile.paths?.sampleData ?? DEFAULT_CONFIG.paths.sampleData,
    },
  };
}

/**
 * Load the config file named by --config (if any) and resolve the final config
 */
export function loadConfig(options: GlobalCommandOptions): EduHubConfig {
  const configFile = options.config ? parseConfigFile(options.config) : undefined;
  return resolveConfig(options, configFile);
}
