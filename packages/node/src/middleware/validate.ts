/**
 * Zod validation helpers.
 *
 * `validateBody()` checks the JSON request body and exposes the parsed
 * value as `validatedBody`; `parseQuery()` does the same for query strings
 * inside a handler. Both answer 400 VALIDATION_ERROR with the zod issues.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ValidatedBodyEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

export interface ValidateBodyOptions {
  /** Treat an empty body as `{}` instead of rejecting it */
  readonly allowEmpty?: boolean;
}

export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  options?: ValidateBodyOptions,
): MiddlewareHandler<ValidatedBodyEnv<T>> {
  return async (c, next) => {
    const text = await c.req.text();

    let body: unknown;
    if (text.trim() === "" && options?.allowEmpty === true) {
      body = {};
    } else {
      try {
        body = JSON.parse(text);
      } catch {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
          400,
        );
      }
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

export type QueryResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly envelope: ErrorEnvelope };

/**
 * Parse the request's query parameters.
 */
export function parseQuery<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): QueryResult<T> {
  const result = schema.safeParse(c.req.query());
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return {
    ok: false,
    envelope: createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
      issues: formatZodErrors(result.error),
    }),
  };
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
