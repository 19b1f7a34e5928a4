import { describe, test, expect, beforeEach } from "vitest";
import {
  INVALID_PRODUCT_ID_MESSAGE,
  decodeProductBody,
  lookupProduct,
  parseProductId,
  replaceProductDetails,
} from "../../src/handlers/products.js";
import { INVALID_PRODUCT_DATA_MESSAGE } from "../../src/models/product.js";
import { ProductStore, createProductStore } from "../../src/store/product-store.js";
import { seedProducts } from "../../src/store/seed.js";

describe("Product Handlers", () => {
  let store: ProductStore;

  beforeEach(() => {
    store = createProductStore();
    seedProducts(store);
  });

  describe("parseProductId", () => {
    test("should parse positive base-10 integers", () => {
      expect(parseProductId("1")).toBe(1);
      expect(parseProductId("0042")).toBe(42);
      expect(parseProductId("+7")).toBe(7);
      expect(parseProductId("2147483647")).toBe(2147483647);
    });

    test.each(["", "0", "-1", "abc", "1.5", "1e3", " 1", "2147483648"])(
      "should reject %j",
      (raw) => {
        expect(parseProductId(raw)).toBeNull();
      },
    );
  });

  describe("lookupProduct", () => {
    test.each(["0", "-1", "abc", ""])("should answer 400 for id %j", (raw) => {
      expect(lookupProduct(store, raw)).toEqual({
        status: 400,
        body: { code: 400, message: INVALID_PRODUCT_ID_MESSAGE },
      });
    });

    test("should return the seeded mouse for id 2", () => {
      expect(lookupProduct(store, "2")).toEqual({
        status: 200,
        body: {
          id: 2,
          name: "Mouse",
          description: "Wireless mouse",
          price: 29.99,
          stock: 50,
          category: "Electronics",
        },
      });
    });

    test("should answer 404 with the id for unknown products", () => {
      expect(lookupProduct(store, "9999")).toEqual({
        status: 404,
        body: { code: 404, message: "Product with ID 9999 not found" },
      });
    });
  });

  describe("decodeProductBody", () => {
    test("should decode a well-formed body", () => {
      expect(decodeProductBody('{"name":"Pad","price":5,"stock":2}')).toEqual({
        ok: true,
        body: { name: "Pad", description: "", price: 5, stock: 2 },
      });
    });

    test("should name the unrecognized key", () => {
      expect(
        decodeProductBody('{"name":"X","price":1,"stock":1,"bogus":true}'),
      ).toEqual({
        ok: false,
        message: "Invalid request body: Unrecognized key(s) in object: 'bogus'",
      });
    });

    test("should reject malformed JSON", () => {
      const result = decodeProductBody('{"name":');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.message.startsWith("Invalid request body: ")).toBe(true);
      }
    });

    test("should reject an empty body", () => {
      expect(decodeProductBody("").ok).toBe(false);
    });

    test("should reject a non-object body", () => {
      expect(decodeProductBody("[1,2]").ok).toBe(false);
    });
  });

  describe("replaceProductDetails", () => {
    test("should answer 400 for an invalid id before reading the body", () => {
      expect(replaceProductDetails(store, "0", "not json")).toEqual({
        status: 400,
        body: { code: 400, message: INVALID_PRODUCT_ID_MESSAGE },
      });
    });

    test("should answer 400 for empty name", () => {
      expect(
        replaceProductDetails(store, "1", '{"name":"","price":1,"stock":1}'),
      ).toEqual({
        status: 400,
        body: { code: 400, message: INVALID_PRODUCT_DATA_MESSAGE },
      });
    });

    test("should answer 400 for negative price", () => {
      const result = replaceProductDetails(
        store,
        "1",
        '{"name":"X","price":-1,"stock":1}',
      );
      expect(result.status).toBe(400);
    });

    test("should answer 400 for a price that overflows to Infinity", () => {
      expect(
        replaceProductDetails(store, "1", '{"name":"X","price":1e400,"stock":1}'),
      ).toEqual({
        status: 400,
        body: {
          code: 400,
          message: "Invalid request body: price: Number must be finite",
        },
      });
      expect(store.get(1)).toEqual({
        id: 1,
        name: "Laptop",
        description: "High-performance laptop",
        price: 999.99,
        stock: 10,
        category: "Electronics",
      });
    });

    test("should answer 400 for an unrecognized field", () => {
      const result = replaceProductDetails(
        store,
        "1",
        '{"name":"X","price":1,"stock":1,"bogus":true}',
      );
      expect(result.status).toBe(400);
      expect(store.get(1)?.name).toBe("Laptop");
    });

    test("should answer 404 for an unknown product", () => {
      expect(
        replaceProductDetails(store, "999", '{"name":"X","price":1,"stock":1}'),
      ).toEqual({
        status: 404,
        body: { code: 404, message: "Product with ID 999 not found" },
      });
      expect(store.get(999)).toBeNull();
    });

    test("should replace an existing product and answer 204", () => {
      const result = replaceProductDetails(
        store,
        "1",
        '{"name":"Pad","description":"d","price":5,"stock":2}',
      );

      expect(result).toEqual({ status: 204 });
      expect(store.get(1)).toEqual({
        id: 1,
        name: "Pad",
        description: "d",
        price: 5,
        stock: 2,
      });
    });

    test("should keep the path id when the body carries another", () => {
      replaceProductDetails(
        store,
        "2",
        '{"id":3,"name":"Pad","description":"d","price":5,"stock":2}',
      );

      expect(store.get(2)?.name).toBe("Pad");
      expect(store.get(3)?.name).toBe("Keyboard");
    });
  });
});
