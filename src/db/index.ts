import { Kysely, PostgresDialect } from "kysely";
import { Pool, types } from "pg";
import { DB } from "../types/db";
import { config } from "../config";

const NUMERIC_OID = 1700;
const INT8_OID = 20;

// Prices and counts arrive as strings by default.
types.setTypeParser(NUMERIC_OID, (value: string) => parseFloat(value));
types.setTypeParser(INT8_OID, (value: string) => parseInt(value, 10));

let poolInstance: Pool | undefined;
let clientInstance: Kysely<DB> | undefined;

const createPool = () => {
  return new Pool({
    connectionString: config.DATABASE_URL,
    max: config.DB_POOL_MAX,
    idleTimeoutMillis: 10000,
  });
};

const getPoolInstance = () => {
  if (!poolInstance) {
    poolInstance = createPool();
  }
  return poolInstance;
};

const dialect = new PostgresDialect({
  pool: async () => getPoolInstance(),
});

export function getSQLClient() {
  if (!clientInstance) {
    clientInstance = new Kysely<DB>({
      dialect,
    });
  }
  return clientInstance;
}

export async function closeSQLClient() {
  if (clientInstance) {
    await clientInstance.destroy();
    clientInstance = undefined;
    poolInstance = undefined;
  }
}
