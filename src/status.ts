import "dotenv/config";
import { loadConfig } from "./config";
import { createContentApiClient } from "./content-api";
import { ContentApiError } from "./errors";

async function main() {
  const restId = process.argv.slice(2)[0];
  if (!restId) {
    console.error("Usage: npm run status -- <channel:lang:country:id>");
    process.exit(1);
  }

  const client = createContentApiClient(loadConfig());
  try {
    const p = await client.getProduct(restId);
    console.log(JSON.stringify({
      atomId: p.atomId,
      externalId: p.externalId,
      title: p.title,
      contentLanguage: p.lang,
      targetCountry: p.country,
      channel: p.channel,
      price: p.price,
      expirationDate: p.expirationDate,
    }, null, 2));
  } catch (e) {
    if (e instanceof ContentApiError && e.status === 404) {
      console.log(`No product ${restId} in account ${client.merchantId}.`);
      return;
    }
    throw e;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
