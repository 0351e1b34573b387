/**
 * CLI configuration types
 */

/**
 * Config file layout (JSON or YAML); every field is optional
 */
export interface EduHubConfigFile {
  mongo?: {
    uri?: string;
    database?: string;
  };
  paths?: {
    schemas?: string;
    sampleData?: string;
  };
}

/**
 * Fully resolved configuration used by the commands
 */
export interface EduHubConfig {
  mongo: {
    uri: string;
    database: string;
  };
  paths: {
    schemas: string;
    sampleData: string;
  };
}

/**
 * Global CLI options shared by every command
 */
export interface GlobalCommandOptions {
  config?: string;
  logLevel?: string;
  uri?: string;
  db?: string;
  schemas?: string;
  data?: string;
}

export const DEFAULT_CONFIG: EduHubConfig = {
  mongo: {
    uri: "mongodb://localhost:27017/",
    database: "eduhub_db",
  },
  paths: {
    schemas: "./data/schema_validation.json",
    sampleData: "./data/sample_data.json",
  },
};
