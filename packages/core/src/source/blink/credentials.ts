import { readFile } from "node:fs/promises";
import { z } from "zod";
import { AuthError } from "../../errors/catalog.js";

const IdSchema = z
  .union([z.number().int(), z.string().min(1)])
  .transform((value) => String(value));

/**
 * Saved Blink session, as written by the vendor login tooling.
 * Only the fields needed to call the REST API are kept.
 */
export const BlinkCredentialsSchema = z.object({
  token: z.string().min(1),
  host: z.string().min(1),
  account_id: IdSchema,
  user_id: IdSchema.optional(),
  client_id: IdSchema.optional(),
  refresh_token: z.string().optional(),
});

export type BlinkCredentials = z.output<typeof BlinkCredentialsSchema>;

/**
 * REST base URL for a credentials host.
 * "u011.immedia-semi.com" → "https://rest-u011.immedia-semi.com"
 */
export function restBaseUrl(host: string): string {
  if (/^https?:\/\//.test(host)) {
    return host.replace(/\/+$/, "");
  }
  return host.startsWith("rest-") ? `https://${host}` : `https://rest-${host}`;
}

export function parseBlinkCredentials(raw: unknown): BlinkCredentials {
  const result = BlinkCredentialsSchema.safeParse(raw);
  if (!result.success) {
    throw new AuthError("Credentials are incomplete", {
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    });
  }
  return result.data;
}

export async function loadBlinkCredentials(
  path: string,
): Promise<BlinkCredentials> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new AuthError("Credentials file not found", { path });
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new AuthError("Credentials file is not valid JSON", { path });
  }

  return parseBlinkCredentials(parsed);
}
