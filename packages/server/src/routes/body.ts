import type { Context } from "hono";
import { z } from "zod";
import { InvalidRequestError } from "@cliparchive/core/errors";
import { ALL_CAMERAS } from "@cliparchive/core/source";

/** A camera name or a list of them; absent means every camera. */
export const CameraNameSchema = z
  .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
  .default(ALL_CAMERAS);

/** Parse a JSON body (empty counts as `{}`) against `schema`. */
export async function readBody<S extends z.ZodType>(
  c: Context,
  schema: S,
): Promise<z.output<S>> {
  const text = await c.req.text();

  let raw: unknown = {};
  if (text.trim() !== "") {
    try {
      raw = JSON.parse(text);
    } catch {
      throw new InvalidRequestError("Request body is not valid JSON");
    }
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidRequestError("Invalid request body", {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return result.data;
}
