import express, { type Express, type Response } from "express";
import type { ProductStore } from "./store/product-store.js";
import {
  lookupProduct,
  replaceProductDetails,
  type HandlerResult,
} from "./handlers/products.js";
import {
  errorHandlerMiddleware,
  requestLoggingMiddleware,
  routeNotFoundMiddleware,
  securityHeadersMiddleware,
} from "./http/middleware.js";

export interface AppDependencies {
  store: ProductStore;
  bodyLimit?: string;
}

// Typed as plain strings so Express exposes the params as a dictionary.
const PRODUCT_PATH: string = "/products/:productId(\\d+)";
const PRODUCT_DETAILS_PATH: string = `${PRODUCT_PATH}/details`;

function sendResult(res: Response, result: HandlerResult): void {
  if (result.status === 204) {
    res.status(204).end();
    return;
  }
  res.status(result.status).json(result.body);
}

export function createApp({ store, bodyLimit = "1mb" }: AppDependencies): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(requestLoggingMiddleware);
  app.use(securityHeadersMiddleware);

  app.get("/health", (_req, res) => {
    res.type("text/plain").status(200).send("OK");
  });

  app.get(PRODUCT_PATH, (req, res) => {
    sendResult(res, lookupProduct(store, req.params.productId));
  });

  // The raw text is decoded by the handler so unknown keys and malformed JSON
  // are rejected there, whatever Content-Type the client sent.
  app.post(
    PRODUCT_DETAILS_PATH,
    express.text({ type: () => true, limit: bodyLimit }),
    (req, res) => {
      const rawBody: unknown = req.body;
      sendResult(
        res,
        replaceProductDetails(
          store,
          req.params.productId,
          typeof rawBody === "string" ? rawBody : "",
        ),
      );
    },
  );

  app.use(routeNotFoundMiddleware);
  app.use(errorHandlerMiddleware);

  return app;
}
