import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CsvInputAdapter, openCsvInputAdapter, parseProductLine } from "./csv-input";

const BASE_ROW = [
  "SKU-1",
  "en",
  "US",
  "Red wool sweater",
  "Comfortable and soft",
  "new",
  "12.99",
  "USD",
  "0.5",
  "kg",
  "3",
  "2011-01-15 10:30",
  "Apparel",
  "Acme",
  "0012345678905",
  "MPN-1",
  "item1.html",
  "http://www.example.com/image1.jpg",
];

function row(changes: Record<number, string> = {}, separator = ";"): string {
  return BASE_ROW.map((value, i) => changes[i] ?? value).join(separator);
}

async function* linesOf(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}

function adapter(lines: string[], skipHeader = false): CsvInputAdapter {
  return new CsvInputAdapter(linesOf(lines), { separator: ";", homepage: "http://shop.example/", skipHeader });
}

describe("parseProductLine", () => {
  it("maps every column", () => {
    expect(parseProductLine(row(), ";", "http://shop.example/")).toEqual({
      externalId: "SKU-1",
      lang: "en",
      country: "US",
      title: "Red wool sweater",
      content: { type: "text", value: "Comfortable and soft" },
      condition: "new",
      price: { unit: "USD", value: "12.99" },
      shippingWeight: { unit: "kg", value: "0.5" },
      quantity: 3,
      expirationDate: new Date(2011, 0, 15, 10, 30).toISOString(),
      productType: "Apparel",
      brand: "Acme",
      gtin: "0012345678905",
      mpn: "MPN-1",
      links: [{ rel: "alternate", type: "text/html", href: "http://shop.example/item1.html" }],
      imageLinks: ["http://www.example.com/image1.jpg"],
    });
  });

  it("omits empty optional fields", () => {
    const product = parseProductLine(row({ 8: "", 9: "", 10: "", 11: "", 12: "", 13: "", 14: "", 15: "", 17: "" }), ";");
    expect(product.shippingWeight).toBeUndefined();
    expect(product.quantity).toBeUndefined();
    expect(product.expirationDate).toBeUndefined();
    expect(product.brand).toBeUndefined();
    expect(product.gtin).toBeUndefined();
    expect(product.imageLinks).toEqual([]);
  });

  it("keeps the description text as written", () => {
    expect(parseProductLine(row({ 4: "Fits sizes < 10 and > 5 cm" }), ";").content?.value).toBe("Fits sizes < 10 and > 5 cm");
    expect(parseProductLine(row({ 4: " Tom &amp; Jerry   mug " }, "|"), "|").content?.value).toBe("Tom &amp; Jerry   mug");
    expect(parseProductLine(row({ 4: "<p>Soft</p>" }), ";").content?.value).toBe("<p>Soft</p>");
  });

  it("uses the separator literally", () => {
    const product = parseProductLine(row({}, "|"), "|");
    expect(product.externalId).toBe("SKU-1");
    expect(product.price).toEqual({ unit: "USD", value: "12.99" });
  });

  it("trims values", () => {
    expect(parseProductLine(row({ 3: "  Red wool sweater " }), ";").title).toBe("Red wool sweater");
  });

  it.each([
    [3, "Title"],
    [0, "ID"],
    [5, "Condition"],
    [6, "Price"],
    [7, "Currency"],
  ])("rejects an empty required column %i", (column, name) => {
    expect(() => parseProductLine(row({ [column]: "" }), ";")).toThrow(`Required argument missing: ${name}`);
  });

  it("rejects a malformed price", () => {
    expect(() => parseProductLine(row({ 6: "12,99" }), ";")).toThrow('Could not parse "12,99" as Price');
  });

  it("rejects a malformed quantity", () => {
    expect(() => parseProductLine(row({ 10: "many" }), ";")).toThrow('Could not parse "many" as Quantity');
  });

  it("rejects a malformed expiration date", () => {
    expect(() => parseProductLine(row({ 11: "15.01.2011" }), ";")).toThrow("Date (15.01.2011) could not be parsed");
  });

  it("rejects a weight without unit", () => {
    expect(() => parseProductLine(row({ 9: "" }), ";")).toThrow("Weight given without unit");
  });

  it("accepts a unit without weight as no weight", () => {
    expect(parseProductLine(row({ 8: "" }), ";").shippingWeight).toBeUndefined();
  });

  it("rejects a short row", () => {
    expect(() => parseProductLine("SKU-1;en;US", ";")).toThrow("Expected 18 fields but found 3");
  });
});

describe("CsvInputAdapter", () => {
  it("records a parsing error and goes on with the next row", async () => {
    const bad = row({ 0: "SKU-2", 3: "" });
    const input = adapter(["header", row(), bad, row({ 0: "SKU-3" })], true);

    const products = await input.getNextProducts(10);

    expect(products.map((p) => p.externalId)).toEqual(["SKU-1", "SKU-3"]);
    expect(input.getParsingErrors()).toHaveLength(1);
    const [error] = input.getParsingErrors();
    expect(error?.rowNumber).toBe(3);
    expect(error?.productId).toBe("SKU-2");
    expect(error?.line).toBe(bad);
    expect(error?.message).toBe("Required argument missing: Title");
  });

  it("returns one product at a time and undefined at the end", async () => {
    const input = adapter([row()]);
    expect((await input.getNextProduct())?.externalId).toBe("SKU-1");
    expect(await input.getNextProduct()).toBeUndefined();
    expect(await input.getNextProduct()).toBeUndefined();
  });

  it("produces ceil(N/K) batches with the remainder last", async () => {
    const lines = Array.from({ length: 10 }, (_, i) => row({ 0: `SKU-${i}` }));
    const input = adapter(lines);
    const sizes: number[] = [];
    for (;;) {
      const batch = await input.getNextProducts(4);
      if (batch.length === 0) break;
      sizes.push(batch.length);
    }
    expect(sizes).toEqual([4, 4, 2]);
  });

  it("fills full batches when N is a multiple of K", async () => {
    const input = adapter(Array.from({ length: 6 }, (_, i) => row({ 0: `SKU-${i}` })));
    expect((await input.getNextProducts(3)).length).toBe(3);
    expect((await input.getNextProducts(3)).length).toBe(3);
    expect(await input.getNextProducts(3)).toEqual([]);
  });

  it("hands each row to exactly one of several concurrent readers", async () => {
    const ids = Array.from({ length: 25 }, (_, i) => `SKU-${i}`);
    const input = adapter(ids.map((id) => row({ 0: id })));

    const worker = async () => {
      const seen: string[][] = [];
      for (;;) {
        const batch = await input.getNextProducts(4);
        if (batch.length === 0) return seen;
        seen.push(batch.map((p) => p.externalId ?? ""));
      }
    };
    const results = await Promise.all([worker(), worker(), worker()]);

    const batches = results.flat();
    expect(batches.flat().sort()).toEqual([...ids].sort());
    expect(batches.map((b) => b.length).sort((a, b) => a - b)).toEqual([1, 4, 4, 4, 4, 4, 4]);
    for (const batch of batches) {
      const positions = batch.map((id) => ids.indexOf(id));
      expect(positions).toEqual(positions.map((_, i) => (positions[0] ?? 0) + i));
    }
  });

  it("rejects an empty separator", () => {
    expect(() => new CsvInputAdapter(linesOf([]), { separator: "" })).toThrow("separator must not be empty");
  });
});

describe("openCsvInputAdapter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "csv-input-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("skips the header line and reads UTF-8", async () => {
    const file = path.join(dir, "products.csv");
    await writeFile(file, ["id;lang;...", row({ 3: "Pullover für Kälte" }), row({ 0: "SKU-2" })].join("\r\n") + "\r\n", "utf8");

    const input = openCsvInputAdapter(file, ";", "http://shop.example/");
    const products = await input.getNextProducts(5);

    expect(products.map((p) => p.title)).toEqual(["Pullover für Kälte", "Red wool sweater"]);
    expect(products[0]?.links[0]?.href).toBe("http://shop.example/item1.html");
    expect(input.getParsingErrors()).toEqual([]);
  });
});
