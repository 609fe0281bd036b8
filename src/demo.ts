import "dotenv/config";
import { loadConfig } from "./config";
import { createContentApiClient } from "./content-api";
import type { ContentApiClient } from "./content-api";
import { ContentApiError } from "./errors";
import { newProduct } from "./model";
import type { Product } from "./model";
import { formatServiceError } from "./report";

const FIRST_ID = 1234567;
const PRODUCT_COUNT = 30;

function createProduct(id: string, homepage: string): Product {
  return newProduct({
    title: "Red wool sweater",
    content: {
      type: "text",
      value: "Comfortable and soft, this sweater will keep you warm on those cold winter nights. Red and blue stripes.",
    },
    appControl: { requiredDestinations: ["ProductAds"], excludedDestinations: [] },
    externalId: id,
    lang: "de",
    country: "DE",
    condition: "new",
    price: { unit: "EUR", value: "12.99" },
    links: [{ rel: "alternate", type: "text/html", href: `${homepage}item1-info-page.html` }],
    imageLinks: ["http://www.example.com/image1.jpg", "http://www.example.com/image2.jpg"],
  });
}

function createChangedProduct(id: string, homepage: string): Product {
  return newProduct({
    title: "Old wool sweater",
    content: { type: "text", value: "This sweater is very old and torn. But it was worn by a film star!" },
    appControl: { requiredDestinations: ["ProductAds"], excludedDestinations: [] },
    externalId: id,
    lang: "en",
    country: "US",
    condition: "used",
    price: { unit: "USD", value: "129.99" },
    links: [{ rel: "alternate", type: "text/html", href: `${homepage}new-item1-info-page.html` }],
  });
}

function displayProducts(products: Product[]) {
  for (const p of products) console.log(`  Product: ${p.title ?? ""} (${p.externalId ?? ""})`);
}

async function displayAllProducts(client: ContentApiClient) {
  console.log("All products:");
  displayProducts(await client.getAllProducts());
}

async function run(client: ContentApiClient, homepage: string) {
  const ids = Array.from({ length: PRODUCT_COUNT }, (_, i) => String(FIRST_ID + i));

  console.log("== Start inserting products ==");
  for (const id of ids) {
    const product = await client.insertProduct(createProduct(id, homepage));
    console.log(`  * Inserted ${product.externalId}`);
  }
  console.log("== Product insertion ok ==");

  await displayAllProducts(client);
  console.log("First product page:");
  displayProducts((await client.listProducts()).entries);

  const thirdId = `online:de:DE:${ids[2]}`;
  const third = await client.getProduct(thirdId);
  console.log(`Retrieved product ${thirdId}: ${third.condition ?? ""} ${third.title ?? ""}`);

  console.log("== Start updating products ==");
  for (const id of ids) {
    const product = await client.updateProduct(createChangedProduct(id, homepage));
    console.log(`  * Updated ${product.externalId}`);
  }
  console.log("== Product update ok ==");
  await displayAllProducts(client);

  console.log("== Changing title of one product ==");
  const product = await client.getProduct(`online:de:DE:${ids[7]}`);
  product.title = "Silk scarf";
  await client.updateProduct(product);
  await displayAllProducts(client);

  console.log("== Start deleting products ==");
  for (const id of ids) {
    const restId = `online:de:DE:${id}`;
    await client.deleteProduct(restId);
    console.log(`  * Deleted ${restId}`);
  }
  console.log("== Product deletion ok ==");
  await displayAllProducts(client);
}

async function main() {
  const config = loadConfig();
  try {
    await run(createContentApiClient(config), config.homepage);
  } catch (e) {
    if (e instanceof ContentApiError && e.serviceErrors.length > 0) {
      console.error(`${e.message}: ${e.serviceErrors.map(formatServiceError).join("")}`);
    }
    throw e;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
