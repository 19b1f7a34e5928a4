import { z } from "zod";

export const MAX_PRODUCT_ID = 2147483647;

const int32 = z.number().int().min(-MAX_PRODUCT_ID - 1).max(MAX_PRODUCT_ID);

export const ProductSchema = z.object({
  id: int32.min(1),
  name: z.string().min(1),
  description: z.string(),
  price: z.number().finite().nonnegative(),
  stock: int32.nonnegative(),
  category: z.string().optional(),
  imageUrl: z.string().optional(),
});

export type Product = z.infer<typeof ProductSchema>;

export type ProductDetails = Omit<Product, "id">;

// Wire shape of a replace body. Absent keys fall back to zero values and any
// key outside this set rejects the whole body.
export const ProductBodySchema = z
  .object({
    id: int32.optional(),
    name: z.string().default(""),
    description: z.string().default(""),
    price: z.number().finite().default(0),
    stock: int32.default(0),
    category: z.string().optional(),
    imageUrl: z.string().optional(),
  })
  .strict();

export type ProductBody = z.infer<typeof ProductBodySchema>;

export const INVALID_PRODUCT_DATA_MESSAGE =
  "Invalid product data: name is required, price and stock must be non-negative";

export type ProductDataValidation =
  | { valid: true; details: ProductDetails }
  | { valid: false; message: string };

/**
 * Applies the catalog rules to a decoded body and strips the body identifier;
 * the caller always supplies the identifier from the request path.
 */
export function validateProductDetails(body: ProductBody): ProductDataValidation {
  if (body.name === "" || body.price < 0 || body.stock < 0) {
    return { valid: false, message: INVALID_PRODUCT_DATA_MESSAGE };
  }

  const { id: _ignored, ...details } = body;
  return { valid: true, details };
}

export interface ErrorResponse {
  code: number;
  message: string;
}
