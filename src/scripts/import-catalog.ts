import { parseArgs } from "util";
import { closeSQLClient, getSQLClient } from "../db";
import { createKyselyStore } from "../repositories/kysely";
import { importCatalog } from "../services/catalogImport";
import { loadFeed } from "../services/feedLoader";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("import-catalog");

const USAGE =
  "Usage: import-catalog (--file <path> | --url <url>) --shop <name> [--user-id <id>]";

async function main() {
  try {
    const { values } = parseArgs({
      options: {
        file: { type: "string" },
        url: { type: "string" },
        shop: { type: "string" },
        "user-id": { type: "string" },
      },
    });

    const source = values.url ?? values.file;
    if (!source || !values.shop || (values.url && values.file)) {
      throw new Error(USAGE);
    }

    let ownerUserId: number | undefined;
    if (values["user-id"] !== undefined) {
      ownerUserId = Number(values["user-id"]);
      if (!Number.isInteger(ownerUserId) || ownerUserId <= 0) {
        throw new Error(`Invalid --user-id: ${values["user-id"]}`);
      }
    }

    const feed = await loadFeed(source);
    const result = await importCatalog(createKyselyStore(getSQLClient()), feed, {
      shopName: values.shop,
      ownerUserId,
    });
    logger.info(result, "Import finished");
  } finally {
    await closeSQLClient();
  }
}

main().catch((err) => {
  logger.error({ error: errorMessage(err) }, "Import failed");
  process.exitCode = 1;
});
