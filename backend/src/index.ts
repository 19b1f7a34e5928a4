import { getConfig } from "./config/env.js";
import { logger } from "./logger.js";
import { createApp } from "./app.js";
import { createProductStore } from "./store/product-store.js";
import { seedProducts } from "./store/seed.js";

const config = getConfig();

const store = createProductStore();
const seeded = seedProducts(store);

const app = createApp({ store, bodyLimit: config.bodyLimit });

const server = app.listen(config.port, config.host, () => {
  logger.info(
    { port: config.port, host: config.host, env: config.nodeEnv },
    "Server started successfully",
  );
  logger.info(
    { count: store.size, ids: seeded.map((product) => product.id) },
    "Initial products seeded",
  );
});

server.on("error", (error) => {
  logger.fatal({ error, port: config.port }, "Server failed to start");
  process.exit(1);
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, "Shutdown signal received, closing server");
  server.close(() => {
    logger.info("Server closed");
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
