import "dotenv/config";
import { loadConfig } from "./config";
import { createContentApiClient } from "./content-api";

async function main() {
  const fileName = process.argv.slice(2)[0];
  const client = createContentApiClient(loadConfig());

  if (fileName) {
    const feed = await client.createDataFeedIfMissing({
      links: [],
      title: fileName,
      feedFileName: fileName,
      targetCountry: "US",
      contentLanguage: "en",
    });
    console.log(feed.atomId ?? feed.feedFileName);
    return;
  }

  for (const f of await client.listDataFeeds()) {
    console.log(`${f.atomId ?? ""}\t${f.feedFileName ?? ""}\t${f.targetCountry ?? ""}`);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
