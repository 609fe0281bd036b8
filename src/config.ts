import { z } from "zod";

export const DEFAULT_ROOT_URL = "https://content.googleapis.com/content/v1/";

/**
 * Environment schema. Validated lazily by loadConfig() so that importing a
 * module never fails on a missing variable.
 */
export const envSchema = z.object({
  MERCHANT_ID: z.string().trim().min(1),
  HOMEPAGE: z.string().trim().default(""),
  CONTENT_API_ROOT_URL: z.string().trim().url().default(DEFAULT_ROOT_URL),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().trim().min(1).default("./gsa-key.json"),
  APPLICATION_NAME: z.string().trim().min(1).default("structured-content-samples-1.0"),
  BUG_REPORT_DIR: z.string().trim().min(1).optional(),
  DEBUG: z.string().optional(),
});

export type AppConfig = {
  merchantId: string;
  homepage: string;
  rootUrl: string;
  keyPath: string;
  applicationName: string;
  bugReportDir: string;
  debug: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment variables: ${fields}`);
  }
  const e = parsed.data;
  return {
    merchantId: e.MERCHANT_ID,
    homepage: e.HOMEPAGE,
    rootUrl: e.CONTENT_API_ROOT_URL.endsWith("/") ? e.CONTENT_API_ROOT_URL : `${e.CONTENT_API_ROOT_URL}/`,
    keyPath: e.GOOGLE_APPLICATION_CREDENTIALS,
    applicationName: e.APPLICATION_NAME,
    bugReportDir: e.BUG_REPORT_DIR ?? process.cwd(),
    debug: (e.DEBUG || "").toLowerCase() === "1",
  };
}
