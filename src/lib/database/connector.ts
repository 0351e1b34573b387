/**
 * MongoDB connection management with pooling
 */

import { MongoClient, type Db } from "mongodb";
import { logger } from "../../utils/logger.js";
import { MongoConnectionError } from "../../utils/errors.js";
import type { EduHubCollections, MongoConnection } from "./types.js";
import { getCollections } from "./collections.js";

export class MongoConnector {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  /**
   * Connect to MongoDB with connection pooling
   */
  async connect(config: MongoConnection): Promise<void> {
    const sanitized = sanitizeUri(config.uri);
    logger.info("Connecting to MongoDB: " + sanitized);

    const client = new MongoClient(config.uri, {
      maxPoolSize: 10,
      minPoolSize: 2,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
    });

    try {
      await client.connect();
    } catch (error) {
      logger.error("MongoDB connection failed", error);
      throw new MongoConnectionError(
        `Failed to connect to MongoDB at ${sanitized}`,
        undefined,
        { cause: error },
      );
    }

    this.client = client;
    this.db = client.db(config.database);
    logger.info("Connected to database: " + config.database);
  }

  getDb(): Db {
    if (!this.db) {
      throw new MongoConnectionError("Not connected to MongoDB. Call connect() first.");
    }
    return this.db;
  }

  getCollections(): EduHubCollections {
    return getCollections(this.getDb());
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      logger.info("MongoDB connection closed");
    }
  }

  isConnected(): boolean {
    return this.client !== null && this.db !== null;
  }
}

/**
 * Sanitize URI for logging (remove credentials)
 */
export function sanitizeUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.username || url.password) {
      return uri.replace(/:\/\/[^@]+@/, "://***:***@");
    }
    return uri;
  } catch {
    return "mongodb://***";
  }
}

/**
 * Factory function for creating connector instances
 */
export async function createConnector(config: MongoConnection): Promise<MongoConnector> {
  const connector = new MongoConnector();
  await connector.connect(config);
  return connector;
}
