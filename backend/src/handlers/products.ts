import type { ZodError } from "zod";
import {
  MAX_PRODUCT_ID,
  ProductBodySchema,
  validateProductDetails,
  type ErrorResponse,
  type Product,
  type ProductBody,
} from "../models/product.js";
import type { ProductStore } from "../store/product-store.js";
import { logger } from "../logger.js";

export type HandlerResult =
  | { status: 200; body: Product }
  | { status: 204 }
  | { status: 400 | 404; body: ErrorResponse };

export const INVALID_PRODUCT_ID_MESSAGE = "Invalid product ID format";

function errorResult(status: 400 | 404, message: string): HandlerResult {
  return { status, body: { code: status, message } };
}

function notFound(id: number): HandlerResult {
  return errorResult(404, `Product with ID ${id} not found`);
}

/**
 * Parses a path segment as a base-10 product id in the 32-bit range.
 * Returns null for anything below 1 or not a plain integer.
 */
export function parseProductId(raw: string): number | null {
  if (!/^[+-]?\d+$/.test(raw)) {
    return null;
  }

  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id < 1 || id > MAX_PRODUCT_ID) {
    return null;
  }
  return id;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

export type BodyDecodeResult =
  | { ok: true; body: ProductBody }
  | { ok: false; message: string };

export function decodeProductBody(raw: string): BodyDecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : "malformed JSON";
    return { ok: false, message: `Invalid request body: ${detail}` };
  }

  const parsed = ProductBodySchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      message: `Invalid request body: ${describeIssues(parsed.error)}`,
    };
  }
  return { ok: true, body: parsed.data };
}

export function lookupProduct(store: ProductStore, rawId: string): HandlerResult {
  const id = parseProductId(rawId);
  if (id === null) {
    return errorResult(400, INVALID_PRODUCT_ID_MESSAGE);
  }

  const product = store.get(id);
  if (!product) {
    return notFound(id);
  }
  return { status: 200, body: product };
}

export function replaceProductDetails(
  store: ProductStore,
  rawId: string,
  rawBody: string,
): HandlerResult {
  const id = parseProductId(rawId);
  if (id === null) {
    return errorResult(400, INVALID_PRODUCT_ID_MESSAGE);
  }

  const decoded = decodeProductBody(rawBody);
  if (!decoded.ok) {
    logger.debug({ productId: id, reason: decoded.message }, "Rejected product body");
    return errorResult(400, decoded.message);
  }

  const validation = validateProductDetails(decoded.body);
  if (!validation.valid) {
    return errorResult(400, validation.message);
  }

  if (!store.replace(id, validation.details)) {
    return notFound(id);
  }

  logger.info({ productId: id }, "Product details replaced");
  return { status: 204 };
}
