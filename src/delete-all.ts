import { configureForDelete } from "./batch";
import type { ContentApiClient } from "./content-api";
import { BatchDeleteError } from "./errors";
import { findLink, isSuccessStatus } from "./model";
import type { Product } from "./model";
import { reportFailedBatch } from "./uploader";
import type { BugReportTarget } from "./uploader";

export const DELETE_PAGE_SIZE = 100;

type DeleteClient = Pick<ContentApiClient, "listProducts" | "postBatch">;

function deletionEntry(p: Product): Product {
  console.log(`Batch will try to delete product ${p.externalId} (${p.title ?? ""})`);
  const entry = configureForDelete<Product>({ links: [] }, p.externalId);
  const edit = findLink(p.links, "edit");
  if (edit !== undefined) entry.atomId = edit;
  return entry;
}

/**
 * Deletes every product of the account, a page at a time. Any failure stops
 * the run: retrying an undeletable product would list it again forever.
 * Returns how many products were deleted.
 */
export async function deleteAllProducts(client: DeleteClient, target: BugReportTarget): Promise<number> {
  let deleted = 0;
  for (;;) {
    const page = await client.listProducts({ maxResults: DELETE_PAGE_SIZE });
    if (page.entries.length === 0) break;

    console.log("== Starting new batch ==");
    const response = await client.postBatch(page.entries.map(deletionEntry));
    if (!response.ok) throw await reportFailedBatch(response, target);

    let failed = false;
    for (const entry of response.entries) {
      if (entry.batchInterrupted) {
        console.error("Batch was interrupted.");
        failed = true;
      } else if (!isSuccessStatus(entry.batchStatus?.code ?? 500)) {
        console.error(
          `Server error during deletion:\n  Product: ${entry.batchId} \tCode: ${entry.batchStatus?.code ?? "none"} \tReason: ${entry.batchStatus?.reason ?? ""}`,
        );
        failed = true;
      } else {
        deleted++;
      }
    }
    if (failed) throw new BatchDeleteError("One or more errors occurred during deletion.");
    console.log(" = Batch processed =");
  }
  console.log(`== Finished, ${deleted} product(s) deleted ==`);
  return deleted;
}
