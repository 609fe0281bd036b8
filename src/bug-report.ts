import { open } from "fs/promises";
import path from "path";

export type BugReport = {
  dir: string;
  merchantId: string;
  requestBody: string;
  status: number;
  statusText: string;
  responseBody: string;
  now?: Date;
};

function candidateName(attempt: number): string {
  return attempt === 0 ? "bugreport.txt" : `bugreport-${attempt}.txt`;
}

function isAlreadyExists(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "EEXIST";
}

/**
 * Writes the request that was sent and the raw response that came back into
 * a new file in `dir`. Never overwrites: the first free name out of
 * bugreport.txt, bugreport-1.txt, bugreport-2.txt, ... is created
 * exclusively. Returns the absolute path.
 */
export async function writeBugReport(report: BugReport): Promise<string> {
  const now = report.now ?? new Date();
  const text = [
    `Time: ${now.toISOString()} (${now.getTime()})`,
    `Merchant ID: ${report.merchantId}`,
    "",
    "== Request ==",
    report.requestBody,
    "",
    "== Response ==",
    `HTTP ${report.status} ${report.statusText}`.trim(),
    report.responseBody,
    "",
  ].join("\n");

  for (let attempt = 0; ; attempt++) {
    const file = path.resolve(report.dir, candidateName(attempt));
    try {
      const handle = await open(file, "wx");
      try {
        await handle.writeFile(text, "utf8");
      } finally {
        await handle.close();
      }
      return file;
    } catch (e) {
      if (!isAlreadyExists(e)) throw e;
    }
  }
}
