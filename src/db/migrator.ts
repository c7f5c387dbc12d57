import { Kysely, Migration, MigrationProvider, Migrator } from "kysely";
import * as initial from "./migrations/001_initial";
import { DB } from "../types/db";

// Register new migrations here, keyed in the order they run.
const migrations: Record<string, Migration> = {
  "001_initial": initial,
};

const provider: MigrationProvider = {
  getMigrations: async () => migrations,
};

export function createMigrator(db: Kysely<DB>) {
  return new Migrator({ db, provider });
}
