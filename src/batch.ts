import { isSuccessStatus } from "./model";
import type { BatchError, BatchOperationType, Product } from "./model";

export const INTERRUPTED_REASON = "Not processed because batch was interrupted";

function configureEntry<T extends Product>(entry: T, operation: BatchOperationType, batchId?: string): T {
  entry.batchOperation = operation;
  if (batchId !== undefined) entry.batchId = batchId;
  return entry;
}

export function configureForInsert<T extends Product>(entry: T, batchId?: string): T {
  return configureEntry(entry, "insert", batchId);
}

export function configureForUpdate<T extends Product>(entry: T, batchId?: string): T {
  return configureEntry(entry, "update", batchId);
}

export function configureForDelete<T extends Product>(entry: T, batchId?: string): T {
  return configureEntry(entry, "delete", batchId);
}

/**
 * Classifies the entries the server returned for a batch.
 *
 * Failed entries are appended to `errors`. If the server interrupted the
 * batch, every sent entry without a matching returned entry is appended as a
 * 500. Passing no `errors` list drops everything and only reports whether
 * the batch was interrupted.
 *
 * Matching is by batch id and consumes each returned id at most once, so a
 * batch id sent twice but returned once yields one error for the extra copy.
 */
export function reconcileBatch(sent: Product[], returned: Product[], errors?: BatchError[]): boolean {
  let wasInterrupted = false;
  for (const entry of returned) {
    if (entry.batchInterrupted) {
      wasInterrupted = true;
      continue;
    }
    const code = entry.batchStatus?.code ?? 500;
    if (!isSuccessStatus(code)) {
      errors?.push({
        id: entry.batchId,
        code,
        reason: entry.batchStatus ? entry.batchStatus.reason : "No batch status returned",
        serviceErrors: entry.content?.errors,
      });
    }
  }

  if (wasInterrupted) reportUnprocessed(sent, returned, errors);
  return wasInterrupted;
}

function reportUnprocessed(sent: Product[], returned: Product[], errors?: BatchError[]) {
  const processed = new Map<string | undefined, number>();
  for (const entry of returned) {
    if (entry.batchInterrupted) continue;
    processed.set(entry.batchId, (processed.get(entry.batchId) ?? 0) + 1);
  }

  for (const entry of sent) {
    const remaining = processed.get(entry.batchId) ?? 0;
    if (remaining > 0) {
      processed.set(entry.batchId, remaining - 1);
    } else {
      errors?.push({ id: entry.batchId, code: 500, reason: INTERRUPTED_REASON });
    }
  }
}
