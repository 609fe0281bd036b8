import "dotenv/config";
import { loadConfig } from "./config";
import { createContentApiClient } from "./content-api";
import { openCsvInputAdapter } from "./csv-input";
import { printStatusReport } from "./report";
import { insertAllProducts } from "./uploader";
import { parsePositiveCount } from "./utils";

const USAGE =
  "Usage: npm run batch-insert -- <file.csv> <separator> <number_of_workers> <max_products_in_batch>";

function parseCount(value: string, what: string): number {
  const n = parsePositiveCount(value);
  if (n === undefined) {
    console.error(`${what} must be a whole number of at least 1, got "${value}"`);
    console.error(USAGE);
    process.exit(1);
  }
  return n;
}

async function main() {
  const args = process.argv.slice(2);
  if (args.length !== 4) {
    console.error("Wrong number of arguments.");
    console.error(USAGE);
    process.exit(1);
  }
  const [file, separator, workersArg, maxArg] = args;
  if (!file || !separator || !workersArg || !maxArg) {
    console.error(USAGE);
    process.exit(1);
  }

  const workers = parseCount(workersArg, "Number of workers");
  console.log(`Using ${workers} worker(s).`);
  const maxProductsInBatch = parseCount(maxArg, "Maximum number of products in one batch");
  console.log(`Sending up to ${maxProductsInBatch} products in one batch.`);

  const config = loadConfig();
  const client = createContentApiClient(config);

  const input = openCsvInputAdapter(file, separator, config.homepage);
  const result = await insertAllProducts(input, client, {
    workers,
    maxProductsInBatch,
    bugReportDir: config.bugReportDir,
    merchantId: config.merchantId,
  });

  console.log(`Sent ${result.batchesSent} batch(es).`);
  printStatusReport(input.getParsingErrors(), result.serviceErrors);

  if (result.workerFailures.length > 0) {
    console.error(`${result.workerFailures.length} worker(s) failed; not every product was sent.`);
    process.exit(1);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
