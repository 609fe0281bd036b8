import type { ServiceError } from "./model";

/** Non-2xx answer to a single (non-batch) request. */
export class ContentApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
    public readonly serviceErrors: ServiceError[] = [],
  ) {
    super(`Content API HTTP ${status} ${statusText}`.trim());
    this.name = "ContentApiError";
  }
}

/** Non-2xx answer to a batch request as a whole. */
export class BatchRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly bugReportPath?: string,
  ) {
    super(`Batch request failed with HTTP ${status}`);
    this.name = "BatchRequestError";
  }
}

export class BatchDeleteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BatchDeleteError";
  }
}

/** A CSV row that could not be turned into a product. */
export class ParsingError extends Error {
  constructor(
    public readonly rowNumber: number,
    public readonly productId: string | undefined,
    public readonly line: string,
    message: string,
  ) {
    super(message);
    this.name = "ParsingError";
  }
}
