import { createReadStream } from "fs";
import { createInterface } from "readline";
import { Mutex } from "async-mutex";
import { ParsingError } from "./errors";
import { newProduct } from "./model";
import type { Product, ShippingWeight } from "./model";
import { isDecimal, isInteger, parseLocalDateTime } from "./utils";

/**
 * Column order of the product CSV. Fields may not contain the separator;
 * there is no quoting.
 */
export const CSV_COLUMNS = [
  "ID",
  "Content language",
  "Target country",
  "Title",
  "Description",
  "Condition",
  "Price",
  "Currency",
  "Weight",
  "Weight unit",
  "Quantity",
  "Expiration date",
  "Product type",
  "Brand",
  "GTIN",
  "MPN",
  "Homepage link",
  "Image link",
] as const;

export type CsvInputOptions = {
  separator: string;
  /** Prefix for the relative homepage link column. */
  homepage?: string;
  /** Discard the first line (column headers). */
  skipHeader?: boolean;
};

/** Anything the batch uploader can pull products from. */
export interface ProductSource {
  getNextProducts(max: number): Promise<Product[]>;
}

class RowError extends Error {}

function parseString(input: string, name: string, required: true): string;
function parseString(input: string, name: string, required: boolean): string | undefined;
function parseString(input: string, name: string, required: boolean): string | undefined {
  if (input === "") {
    if (required) throw new RowError(`Required argument missing: ${name}`);
    return undefined;
  }
  return input.trim();
}

function parseDecimal(input: string, name: string, required: boolean): string | undefined {
  const value = parseString(input, name, required);
  if (value === undefined) return undefined;
  if (!isDecimal(value)) throw new RowError(`Could not parse "${input}" as ${name}`);
  return value;
}

function parseInteger(input: string, name: string): number | undefined {
  const value = parseString(input, name, false);
  if (value === undefined) return undefined;
  if (!isInteger(value)) throw new RowError(`Could not parse "${input}" as ${name}`);
  return parseInt(value, 10);
}

function parseDate(input: string, name: string): string | undefined {
  const value = parseString(input, name, false);
  if (value === undefined) return undefined;
  const date = parseLocalDateTime(value);
  if (!date) throw new RowError(`Date (${input}) could not be parsed`);
  return date.toISOString();
}

function parseWeight(weight: string, unit: string): ShippingWeight | undefined {
  const parsedUnit = parseString(unit, "Weight unit", false);
  const parsedWeight = parseDecimal(weight, "Weight", false);
  if (parsedWeight === undefined) return undefined;
  if (parsedUnit === undefined) throw new RowError("Weight given without unit");
  return { unit: parsedUnit, value: parsedWeight };
}

/**
 * Turns one CSV line into a product. Throws RowError with a message meant for
 * the run summary.
 */
export function parseProductLine(line: string, separator: string, homepage = ""): Product {
  const parts = line.split(separator);
  if (parts.length < CSV_COLUMNS.length) {
    throw new RowError(`Expected ${CSV_COLUMNS.length} fields but found ${parts.length}`);
  }
  const field = (i: number) => parts[i] ?? "";

  const product = newProduct({
    externalId: parseString(field(0), "ID", true),
    lang: parseString(field(1), "Content language", true),
    country: parseString(field(2), "Target country", true),
    title: parseString(field(3), "Title", true),
    content: { type: "text", value: parseString(field(4), "Description", true) },
    condition: parseString(field(5), "Condition", true),
  });

  const amount = parseDecimal(field(6), "Price", true);
  const currency = parseString(field(7), "Currency", true);
  if (amount !== undefined) product.price = { unit: currency, value: amount };

  const weight = parseWeight(field(8), field(9));
  if (weight) product.shippingWeight = weight;

  const quantity = parseInteger(field(10), "Quantity");
  if (quantity !== undefined) product.quantity = quantity;

  const expiration = parseDate(field(11), "Expiration date");
  if (expiration) product.expirationDate = expiration;

  const productType = parseString(field(12), "Product type", false);
  const brand = parseString(field(13), "Brand", false);
  const gtin = parseString(field(14), "GTIN", false);
  const mpn = parseString(field(15), "MPN", false);
  if (productType) product.productType = productType;
  if (brand) product.brand = brand;
  if (gtin) product.gtin = gtin;
  if (mpn) product.mpn = mpn;

  product.links.push({ rel: "alternate", type: "text/html", href: homepage + field(16).trim() });

  const imageLink = parseString(field(17), "Image link", false);
  product.imageLinks = imageLink ? [imageLink] : [];

  return product;
}

/**
 * Reads products from a line source, one product per line.
 *
 * Safe to share between concurrent uploaders: every read happens under one
 * mutex, so each line is handed out exactly once and a batch is always a run
 * of consecutive lines. Rows that fail to parse are skipped and kept in
 * getParsingErrors().
 */
export class CsvInputAdapter implements ProductSource {
  private readonly lines: AsyncIterator<string>;
  private readonly mutex = new Mutex();
  private readonly parsingErrors: ParsingError[] = [];
  private rowNumber = 0;
  private exhausted = false;

  constructor(
    lines: AsyncIterable<string>,
    private readonly options: CsvInputOptions,
  ) {
    if (options.separator === "") throw new Error("separator must not be empty");
    this.lines = lines[Symbol.asyncIterator]();
  }

  private async readLine(): Promise<string | undefined> {
    if (this.exhausted) return undefined;
    for (;;) {
      const next = await this.lines.next();
      if (next.done) {
        this.exhausted = true;
        return undefined;
      }
      this.rowNumber++;
      if (this.rowNumber === 1 && this.options.skipHeader) continue;
      return next.value;
    }
  }

  private async readProduct(): Promise<Product | undefined> {
    for (;;) {
      const line = await this.readLine();
      if (line === undefined) return undefined;
      try {
        return parseProductLine(line, this.options.separator, this.options.homepage);
      } catch (e) {
        if (!(e instanceof RowError)) throw e;
        const id = line.split(this.options.separator)[0];
        this.parsingErrors.push(new ParsingError(this.rowNumber, id, line, e.message));
      }
    }
  }

  /** Next parsable product, or undefined when the input is exhausted. */
  async getNextProduct(): Promise<Product | undefined> {
    return this.mutex.runExclusive(() => this.readProduct());
  }

  /** Up to `max` products; an empty list means there are no more. */
  async getNextProducts(max: number): Promise<Product[]> {
    return this.mutex.runExclusive(async () => {
      const products: Product[] = [];
      while (products.length < max) {
        const product = await this.readProduct();
        if (!product) break;
        products.push(product);
      }
      return products;
    });
  }

  getParsingErrors(): readonly ParsingError[] {
    return this.parsingErrors;
  }
}

/** Opens a UTF-8 CSV file whose first line holds column headers. */
export function openCsvInputAdapter(filePath: string, separator: string, homepage = ""): CsvInputAdapter {
  const input = createReadStream(filePath, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Infinity });
  return new CsvInputAdapter(lines, { separator, homepage, skipHeader: true });
}
