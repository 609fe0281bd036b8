import type { BatchResponse } from "./content-api";
import type { ProductSource } from "./csv-input";
import { writeBugReport } from "./bug-report";
import { configureForInsert, reconcileBatch } from "./batch";
import { BatchRequestError } from "./errors";
import type { BatchError, Product } from "./model";

/** The one call the uploader needs from ContentApiClient. */
export interface BatchTransport {
  postBatch(entries: Product[]): Promise<BatchResponse>;
}

export type BugReportTarget = {
  bugReportDir: string;
  merchantId: string;
};

export type InsertOptions = BugReportTarget & {
  workers: number;
  maxProductsInBatch: number;
};

export type InsertResult = {
  serviceErrors: BatchError[];
  /** One entry per worker that stopped on an error. */
  workerFailures: unknown[];
  batchesSent: number;
};

/**
 * Files a bug report for a batch the server refused as a whole, logs where
 * it went and returns the error to throw.
 */
export async function reportFailedBatch(
  response: Extract<BatchResponse, { ok: false }>,
  target: BugReportTarget,
): Promise<BatchRequestError> {
  console.error(`Content API unexpectedly returned HTTP ${response.status} for a batch request.`);
  try {
    const file = await writeBugReport({
      dir: target.bugReportDir,
      merchantId: target.merchantId,
      requestBody: response.requestBody,
      status: response.status,
      statusText: response.statusText,
      responseBody: response.body,
    });
    console.error(
      `A bug report file has been created here:\n${file}\n` +
        "It contains the request you sent, the server response you received, the current time and your merchant id.",
    );
    return new BatchRequestError(response.status, file);
  } catch (e) {
    console.error("A bug report file could not be created.", e);
    return new BatchRequestError(response.status);
  }
}

/** Sends insert batches and records per-item failures into a shared list. */
export class BatchUploader {
  batchesSent = 0;

  constructor(
    private readonly transport: BatchTransport,
    private readonly serviceErrors: BatchError[],
    private readonly target: BugReportTarget,
  ) {}

  /** Overwrites batch operation and id on every product. */
  async sendBatch(products: Product[]): Promise<void> {
    const entries = products.map((p) => configureForInsert(p, p.externalId));
    const response = await this.transport.postBatch(entries);
    this.batchesSent++;
    if (!response.ok) throw await reportFailedBatch(response, this.target);
    if (reconcileBatch(entries, response.entries, this.serviceErrors)) {
      console.error("Batch was interrupted.");
    }
  }

  /** Pulls and sends batches until the source runs dry. */
  async run(source: ProductSource, maxProductsInBatch: number): Promise<void> {
    for (;;) {
      const products = await source.getNextProducts(maxProductsInBatch);
      if (products.length === 0) return;
      await this.sendBatch(products);
    }
  }
}

/**
 * Runs `workers` uploaders against one shared source and waits for all of
 * them, including those still running after another one failed.
 */
export async function insertAllProducts(
  source: ProductSource,
  transport: BatchTransport,
  options: InsertOptions,
): Promise<InsertResult> {
  if (!Number.isInteger(options.workers) || options.workers < 1) {
    throw new Error(`workers must be a positive integer, got ${options.workers}`);
  }
  if (!Number.isInteger(options.maxProductsInBatch) || options.maxProductsInBatch < 1) {
    throw new Error(`maxProductsInBatch must be a positive integer, got ${options.maxProductsInBatch}`);
  }

  const serviceErrors: BatchError[] = [];
  const uploaders = Array.from(
    { length: options.workers },
    () => new BatchUploader(transport, serviceErrors, options),
  );

  console.log(`Starting ${uploaders.length} worker(s), up to ${options.maxProductsInBatch} products per batch`);
  const results = await Promise.allSettled(uploaders.map((u) => u.run(source, options.maxProductsInBatch)));

  const workerFailures: unknown[] = [];
  results.forEach((r, i) => {
    if (r.status === "rejected") {
      console.error(`Worker ${i + 1} stopped:`, r.reason);
      workerFailures.push(r.reason);
    }
  });

  return {
    serviceErrors,
    workerFailures,
    batchesSent: uploaders.reduce((n, u) => n + u.batchesSent, 0),
  };
}
