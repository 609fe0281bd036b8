import "dotenv/config";
import { loadConfig } from "./config";
import { createContentApiClient } from "./content-api";
import { deleteAllProducts } from "./delete-all";

async function main() {
  const config = loadConfig();
  const client = createContentApiClient(config);

  console.log(`Deleting every product of merchant ${config.merchantId}...`);
  await deleteAllProducts(client, { bugReportDir: config.bugReportDir, merchantId: config.merchantId });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
