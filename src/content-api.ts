import fetch from "node-fetch";
import type { Response } from "node-fetch";
import {
  ATOM_CONTENT_TYPE,
  GDATA_ERROR_CONTENT_TYPE,
  dataFeedToXml,
  parseDataFeed,
  parseDataFeedFeed,
  parseProduct,
  parseProductFeed,
  parseServiceErrors,
  productFeedToXml,
  productToXml,
} from "./atom";
import { createTokenProvider } from "./auth";
import type { AppConfig } from "./config";
import { ContentApiError } from "./errors";
import { findLink } from "./model";
import type { DataFeed, Product, ProductFeed, ServiceError } from "./model";

export type ContentApiOptions = {
  /** e.g. https://content.googleapis.com/content/v1/ (trailing slash required) */
  rootUrl: string;
  merchantId: string;
  applicationName: string;
  getAccessToken: () => Promise<string>;
  debug?: boolean;
};

export type BatchResponse =
  | { ok: true; status: number; entries: Product[] }
  | { ok: false; status: number; statusText: string; body: string; requestBody: string };

type ListOptions = {
  maxResults?: number;
  /** Absolute URL, typically a feed's "next" link. Overrides maxResults. */
  url?: string;
};

/** REST id of a product: {channel}:{lang}:{country}:{externalId}, not URL-encoded. */
export function productRestId(p: Pick<Product, "channel" | "lang" | "country" | "externalId">): string {
  if (!p.externalId) throw new Error("product has no externalId");
  return `${p.channel || "online"}:${p.lang ?? "en"}:${p.country ?? "US"}:${p.externalId}`;
}

/** Path segment for a REST id; only the external id part is encoded. */
export function restIdPath(restId: string): string {
  const parts = restId.split(":");
  if (parts.length < 4) return encodeURIComponent(restId);
  return `${parts.slice(0, 3).join(":")}:${encodeURIComponent(parts.slice(3).join(":"))}`;
}

/**
 * Client for the items/products and datafeeds feeds of one merchant account.
 * Single requests throw ContentApiError on a non-2xx answer; batch requests
 * hand the failure back to the caller instead (see postBatch).
 */
export class ContentApiClient {
  constructor(private readonly options: ContentApiOptions) {}

  get merchantId(): string {
    return this.options.merchantId;
  }

  private productsUrl(suffix = ""): string {
    return `${this.options.rootUrl}${this.options.merchantId}/items/products/schema${suffix}`;
  }

  private dataFeedsUrl(): string {
    return `${this.options.rootUrl}${this.options.merchantId}/datafeeds/products`;
  }

  private debug(...args: unknown[]) {
    if (this.options.debug) console.log("DEBUG", ...args);
  }

  private async send(method: string, url: string, body?: string): Promise<Response> {
    const token = await this.options.getAccessToken();
    this.debug(`${method} ${url}`);
    if (body !== undefined) this.debug("request body:", body);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      "GData-Version": "1",
      "User-Agent": this.options.applicationName,
    };
    if (body !== undefined) headers["Content-Type"] = ATOM_CONTENT_TYPE;

    const res = await fetch(url, { method, headers, body });
    this.debug(`HTTP ${res.status} ${res.statusText}`);
    return res;
  }

  /** Sends a single request and returns the response body, throwing on non-2xx. */
  private async request(method: string, url: string, body?: string): Promise<string> {
    const res = await this.send(method, url, body);
    const text = await res.text();
    if (res.ok) return text;

    let serviceErrors: ServiceError[] = [];
    if ((res.headers.get("content-type") ?? "").startsWith(GDATA_ERROR_CONTENT_TYPE)) {
      try {
        serviceErrors = await parseServiceErrors(text);
      } catch (e) {
        this.debug("could not parse error body:", e);
      }
    }
    throw new ContentApiError(res.status, res.statusText, text, serviceErrors);
  }

  async insertProduct(product: Product): Promise<Product> {
    return parseProduct(await this.request("POST", this.productsUrl(), productToXml(product)));
  }

  async updateProduct(product: Product): Promise<Product> {
    const url = this.productsUrl(`/${restIdPath(productRestId(product))}`);
    return parseProduct(await this.request("PUT", url, productToXml(product)));
  }

  /** `restId` as built by productRestId, not URL-encoded. */
  async getProduct(restId: string): Promise<Product> {
    return parseProduct(await this.request("GET", this.productsUrl(`/${restIdPath(restId)}`)));
  }

  async deleteProduct(restId: string): Promise<void> {
    await this.request("DELETE", this.productsUrl(`/${restIdPath(restId)}`));
  }

  /** One page of the product feed. */
  async listProducts(options: ListOptions = {}): Promise<ProductFeed> {
    const url =
      options.url ?? this.productsUrl(options.maxResults !== undefined ? `?max-results=${options.maxResults}` : "");
    return parseProductFeed(await this.request("GET", url));
  }

  /** Every product, following the feed's "next" links page by page. */
  async *iterateProducts(options: Pick<ListOptions, "maxResults"> = {}): AsyncGenerator<Product> {
    let feed = await this.listProducts(options);
    for (;;) {
      yield* feed.entries;
      const next = findLink(feed.links, "next");
      if (!next) return;
      feed = await this.listProducts({ url: next });
    }
  }

  async getAllProducts(): Promise<Product[]> {
    const all: Product[] = [];
    for await (const p of this.iterateProducts()) all.push(p);
    return all;
  }

  /**
   * Posts a batch feed. A non-2xx status for the batch as a whole is returned,
   * not thrown, together with the request body so the caller can file it.
   */
  async postBatch(entries: Product[]): Promise<BatchResponse> {
    const requestBody = productFeedToXml(entries);
    const res = await this.send("POST", this.productsUrl("/batch"), requestBody);
    const body = await res.text();
    if (!res.ok) {
      return { ok: false, status: res.status, statusText: res.statusText, body, requestBody };
    }
    const feed = await parseProductFeed(body);
    return { ok: true, status: res.status, entries: feed.entries };
  }

  async listDataFeeds(): Promise<DataFeed[]> {
    return parseDataFeedFeed(await this.request("GET", this.dataFeedsUrl()));
  }

  async insertDataFeed(feed: DataFeed): Promise<DataFeed> {
    return parseDataFeed(await this.request("POST", this.dataFeedsUrl(), dataFeedToXml(feed)));
  }

  /** Returns the data feed registered for `fileName`, creating it first if needed. */
  async createDataFeedIfMissing(feed: DataFeed & { feedFileName: string }): Promise<DataFeed> {
    const existing = (await this.listDataFeeds()).find((f) => f.feedFileName === feed.feedFileName);
    if (existing) {
      this.debug("existing data feed:", existing.atomId);
      return existing;
    }
    const created = await this.insertDataFeed(feed);
    this.debug("created data feed:", created.atomId);
    return created;
  }
}

/** Client for the configured account, authenticated with the configured service-account key. */
export function createContentApiClient(config: AppConfig): ContentApiClient {
  return new ContentApiClient({
    rootUrl: config.rootUrl,
    merchantId: config.merchantId,
    applicationName: config.applicationName,
    getAccessToken: createTokenProvider(config.keyPath),
    debug: config.debug,
  });
}
