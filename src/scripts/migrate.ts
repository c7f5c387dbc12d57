import { closeSQLClient, getSQLClient } from "../db";
import { createMigrator } from "../db/migrator";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("migrate");

async function main() {
  try {
    const direction = process.argv[2] === "down" ? "down" : "up";
    const migrator = createMigrator(getSQLClient());
    const { error, results } =
      direction === "down" ? await migrator.migrateDown() : await migrator.migrateToLatest();

    for (const result of results ?? []) {
      if (result.status === "Success") {
        logger.info(`Migration "${result.migrationName}" ${direction} done`);
      } else if (result.status === "Error") {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      throw error;
    }
  } finally {
    await closeSQLClient();
  }
}

main().catch((err) => {
  logger.error({ error: errorMessage(err) }, "Migration failed");
  process.exitCode = 1;
});
