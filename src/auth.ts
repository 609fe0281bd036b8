import fs from "fs";
import { JWT } from "google-auth-library";
import { z } from "zod";

export const CONTENT_SCOPE = "https://www.googleapis.com/auth/content";

const serviceAccountKeySchema = z.object({
  type: z.literal("service_account"),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

export function readServiceAccountKey(keyPath: string): ServiceAccountKey {
  if (!fs.existsSync(keyPath)) throw new Error(`Key file not found at ${keyPath}`);
  const parsed = serviceAccountKeySchema.safeParse(JSON.parse(fs.readFileSync(keyPath, "utf8")));
  if (!parsed.success) {
    throw new Error(`${keyPath} is not a valid service-account key (missing private_key/client_email or wrong type)`);
  }
  return parsed.data;
}

/**
 * Bearer tokens for the Content API from a service-account key. The JWT
 * client is built on first use and refreshes its own token afterwards.
 */
export function createTokenProvider(keyPath: string): () => Promise<string> {
  let client: JWT | undefined;
  return async () => {
    if (!client) {
      const key = readServiceAccountKey(keyPath);
      client = new JWT({ email: key.client_email, key: key.private_key, scopes: [CONTENT_SCOPE] });
    }
    const { token } = await client.getAccessToken();
    if (!token) throw new Error("Could not obtain Google access token");
    return token;
  };
}
