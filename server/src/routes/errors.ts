/**
 * HTTP error mapping
 */

import type { Context } from "hono";
import type { z } from "zod";
import { GatewayError, InvalidRequestError, UpstreamError, TranslationError, MemoryCapacityError, toErrorMessage } from "../errors.js";

export type ErrorStatus = 400 | 404 | 409 | 413 | 500 | 502;

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    provider?: string;
    status?: number;
    body?: string;
    limit?: number;
  };
}

const STATUS_BY_CODE: Partial<Record<GatewayError["code"], ErrorStatus>> = {
  invalid_request: 400,
  session_not_found: 404,
  memory_not_found: 404,
  memory_conflict: 409,
  memory_capacity: 413,
  exchange_cancelled: 409,
  upstream_error: 502,
  translation_error: 502,
};

export function toHttpError(err: unknown): { status: ErrorStatus; body: ErrorBody } {
  if (!(err instanceof GatewayError)) {
    return { status: 500, body: { error: { code: "internal_error", message: toErrorMessage(err) } } };
  }
  const body: ErrorBody = { error: { code: err.code, message: err.message } };
  if (err instanceof UpstreamError) {
    body.error.provider = err.provider;
    body.error.status = err.status;
    body.error.body = err.body;
  } else if (err instanceof TranslationError) {
    body.error.provider = err.provider;
  } else if (err instanceof MemoryCapacityError) {
    body.error.limit = err.limit;
  }
  return { status: STATUS_BY_CODE[err.code] ?? 500, body };
}

/** Parse a JSON body against a schema; an empty body parses as {} */
export async function readBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.infer<S>> {
  const text = await c.req.text();
  let raw: unknown = {};
  if (text.trim()) {
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new InvalidRequestError(`Request body is not valid JSON: ${toErrorMessage(err)}`);
    }
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    throw new InvalidRequestError(`Invalid request body: ${detail}`);
  }
  return parsed.data;
}
