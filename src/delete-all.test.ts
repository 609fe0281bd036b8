import { mkdtemp, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { BatchResponse } from "./content-api";
import { DELETE_PAGE_SIZE, deleteAllProducts } from "./delete-all";
import { BatchDeleteError, BatchRequestError } from "./errors";
import type { Product, ProductFeed } from "./model";

function stored(id: string): Product {
  return {
    externalId: id,
    title: `Item ${id}`,
    links: [{ rel: "edit", type: "application/atom+xml", href: `https://content.example.test/1/items/products/schema/online:en:US:${id}` }],
  };
}

/** In-memory account: list returns the first page, batch deletes remove products. */
class FakeAccount {
  readonly listed: (number | undefined)[] = [];
  readonly batches: Product[][] = [];

  constructor(
    public products: Product[],
    private readonly answer?: (entries: Product[]) => BatchResponse,
  ) {}

  async listProducts(options: { maxResults?: number } = {}): Promise<ProductFeed> {
    this.listed.push(options.maxResults);
    return { links: [], entries: this.products.slice(0, options.maxResults ?? 25) };
  }

  async postBatch(entries: Product[]): Promise<BatchResponse> {
    this.batches.push(entries);
    if (this.answer) return this.answer(entries);
    const ids = new Set(entries.map((e) => e.batchId));
    this.products = this.products.filter((p) => !ids.has(p.externalId));
    return {
      ok: true,
      status: 200,
      entries: entries.map((e) => ({ links: [], batchId: e.batchId, batchStatus: { code: 200, reason: "Success" } })),
    };
  }
}

describe("deleteAllProducts", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    dir = await mkdtemp(path.join(tmpdir(), "delete-all-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("deletes page after page until the account is empty", async () => {
    const account = new FakeAccount(Array.from({ length: 150 }, (_, i) => stored(String(i + 1))));

    const deleted = await deleteAllProducts(account, { bugReportDir: dir, merchantId: "1" });

    expect(deleted).toBe(150);
    expect(account.products).toEqual([]);
    expect(account.batches.map((b) => b.length)).toEqual([100, 50]);
    expect(account.listed).toEqual([DELETE_PAGE_SIZE, DELETE_PAGE_SIZE, DELETE_PAGE_SIZE]);
  });

  it("addresses each entry by its edit link", async () => {
    const account = new FakeAccount([stored("42")]);

    await deleteAllProducts(account, { bugReportDir: dir, merchantId: "1" });

    expect(account.batches[0]).toEqual([
      {
        links: [],
        batchOperation: "delete",
        batchId: "42",
        atomId: "https://content.example.test/1/items/products/schema/online:en:US:42",
      },
    ]);
  });

  it("returns 0 for an empty account without posting", async () => {
    const account = new FakeAccount([]);

    expect(await deleteAllProducts(account, { bugReportDir: dir, merchantId: "1" })).toBe(0);
    expect(account.batches).toEqual([]);
  });

  it("stops on an item that could not be deleted", async () => {
    const account = new FakeAccount([stored("1"), stored("2")], (entries) => ({
      ok: true,
      status: 200,
      entries: entries.map((e) => ({
        links: [],
        batchId: e.batchId,
        batchStatus: e.batchId === "2" ? { code: 404, reason: "Not Found" } : { code: 200 },
      })),
    }));

    await expect(deleteAllProducts(account, { bugReportDir: dir, merchantId: "1" })).rejects.toBeInstanceOf(BatchDeleteError);
    expect(account.batches).toHaveLength(1);
    expect(console.error).toHaveBeenCalledWith("Server error during deletion:\n  Product: 2 \tCode: 404 \tReason: Not Found");
  });

  it("stops on an interrupted batch", async () => {
    const account = new FakeAccount([stored("1")], () => ({
      ok: true,
      status: 200,
      entries: [{ links: [], batchInterrupted: { reason: "quota" } }],
    }));

    await expect(deleteAllProducts(account, { bugReportDir: dir, merchantId: "1" })).rejects.toThrow(
      "One or more errors occurred during deletion.",
    );
    expect(console.error).toHaveBeenCalledWith("Batch was interrupted.");
  });

  it("files a bug report when the batch itself fails", async () => {
    const account = new FakeAccount([stored("1")], () => ({
      ok: false,
      status: 503,
      statusText: "Service Unavailable",
      body: "try later",
      requestBody: "<feed/>",
    }));

    const error = await deleteAllProducts(account, { bugReportDir: dir, merchantId: "1" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BatchRequestError);
    expect(error).toMatchObject({ status: 503, bugReportPath: path.join(dir, "bugreport.txt") });
    expect(await readdir(dir)).toEqual(["bugreport.txt"]);
  });
});
