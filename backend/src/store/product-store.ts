import type { Product, ProductDetails } from "../models/product.js";
import { logger } from "../logger.js";

/**
 * In-memory catalog keyed by product id.
 *
 * Every method is synchronous: handlers run on the single event loop and none
 * of them can interleave with a store call, so `replace` checks and writes
 * atomically and readers never observe a half-written record. Records are
 * copied in and out, leaving the store as the only owner of its products.
 */
export class ProductStore {
  private products: Map<number, Product> = new Map();
  private nextId = 1;

  get size(): number {
    return this.products.size;
  }

  get(id: number): Product | null {
    const product = this.products.get(id);
    return product ? { ...product } : null;
  }

  /**
   * Overwrites the whole record for `id`. Never inserts: an unknown id
   * leaves the map untouched and returns false.
   */
  replace(id: number, details: ProductDetails): boolean {
    if (!this.products.has(id)) {
      logger.debug({ productId: id }, "Product not found for replacement");
      return false;
    }

    this.products.set(id, toRecord(id, details));
    logger.debug({ productId: id }, "Product replaced");
    return true;
  }

  create(details: ProductDetails): Product {
    const id = this.nextId;
    this.nextId++;

    const product = toRecord(id, details);
    this.products.set(id, product);
    logger.debug({ productId: id }, "Product created");
    return { ...product };
  }
}

// Builds a fresh record so the id always comes from the store, even when the
// caller passes an object that still carries one.
function toRecord(id: number, details: ProductDetails): Product {
  const product: Product = {
    id,
    name: details.name,
    description: details.description,
    price: details.price,
    stock: details.stock,
  };
  if (details.category !== undefined) {
    product.category = details.category;
  }
  if (details.imageUrl !== undefined) {
    product.imageUrl = details.imageUrl;
  }
  return product;
}

export function createProductStore(): ProductStore {
  return new ProductStore();
}
