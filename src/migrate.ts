import type { MigrationCollections } from "./collections.js";
import { failureBanner, runMigration, type MigrationLogger, type MigrationReport } from "./migrations.js";

// The lifecycle half of MongoClient.
export type MigrationConnection = {
  connect(): Promise<unknown>;
  close(): Promise<void>;
};

/**
 * Connects, runs every step and closes the connection once, whichever way
 * the run ends. A connection failure is logged like a failed step.
 */
export async function migrate(
  connection: MigrationConnection,
  collections: MigrationCollections,
  logger: MigrationLogger = console,
): Promise<MigrationReport> {
  try {
    try {
      await connection.connect();
    } catch (err) {
      logger.error(failureBanner(err));
      throw err;
    }
    return await runMigration({ collections, logger });
  } finally {
    await connection.close();
  }
}
