/**
 * Helpers shared by the CLI commands
 */

import { InvalidArgumentError } from "commander";
import type { Db } from "mongodb";
import { createConnector } from "../../lib/database/connector.js";
import { ErrorCode, toEduHubError } from "../../utils/errors.js";
import type { EduHubConfig } from "../config/types.js";

const EXIT_CODES: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.CONFIG_ERROR]: 2,
  [ErrorCode.MONGO_CONNECTION_ERROR]: 3,
  [ErrorCode.FILE_IO_ERROR]: 4,
};

/**
 * Connect, run `fn` against the configured database, always disconnect
 */
export async function withDatabase<T>(
  config: EduHubConfig,
  fn: (db: Db) => Promise<T>,
): Promise<T> {
  const connector = await createConnector(config.mongo);
  try {
    return await fn(connector.getDb());
  } finally {
    await connector.close();
  }
}

/**
 * Print the error response for `phase` on stderr and exit with the code
 * matching the error category
 */
export function exitWithError(error: unknown, phase: string): never {
  const eduHubError = toEduHubError(error);
  console.error(JSON.stringify(eduHubError.toResponse(phase), null, 2));
  process.exit(EXIT_CODES[eduHubError.code] ?? 1);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got: ${value}`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got: ${value}`);
  }
  return parsed;
}

export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
