import type { Product, ProductDetails } from "../models/product.js";
import type { ProductStore } from "./product-store.js";

export const SEED_PRODUCTS: readonly ProductDetails[] = [
  {
    name: "Laptop",
    description: "High-performance laptop",
    price: 999.99,
    stock: 10,
    category: "Electronics",
  },
  {
    name: "Mouse",
    description: "Wireless mouse",
    price: 29.99,
    stock: 50,
    category: "Electronics",
  },
  {
    name: "Keyboard",
    description: "Mechanical keyboard",
    price: 79.99,
    stock: 30,
    category: "Electronics",
  },
];

export function seedProducts(store: ProductStore): Product[] {
  return SEED_PRODUCTS.map((details) => store.create(details));
}
