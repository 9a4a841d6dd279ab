import type { Context } from "hono";
import type { z } from "zod";
import { ValidationError } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";

export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): Result<z.output<S>, ValidationError> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    return err(
      new ValidationError("Validation failed", "VALIDATION_ERROR", { errors })
    );
  }

  return ok(result.data);
}

export interface JsonBodyOptions {
  /** Parse a missing or blank body as `{}` */
  allowEmpty?: boolean;
}

export async function parseJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
  options: JsonBodyOptions = {}
): Promise<Result<z.output<S>, ValidationError>> {
  let body: unknown;
  try {
    if (options.allowEmpty) {
      const text = await c.req.text();
      body = text.trim() === "" ? {} : JSON.parse(text);
    } else {
      body = await c.req.json();
    }
  } catch (error) {
    return err(
      new ValidationError("Request body must be valid JSON", "VALIDATION_ERROR", {
        reason: error instanceof Error ? error.message : String(error),
      })
    );
  }
  return parseWith(schema, body);
}
