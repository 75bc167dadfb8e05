// server/src/index.ts
/** Boot file: creates HTTP server, starts listening, and handles graceful shutdown. */

import http from "http";

import { createApp } from "./app.js";
import { connectMongo, closeMongo } from "./config/db.js";
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { createBookingService } from "./modules/bookings/service.js";
import { mongoBookingStore } from "./modules/bookings/store.js";
import { mongoItemStore } from "./modules/items/store.js";
import { mongoUserStore } from "./modules/users/store.js";

const app = createApp({
  bookings: createBookingService({
    users: mongoUserStore,
    items: mongoItemStore,
    bookings: mongoBookingStore,
  }),
});
const server = http.createServer(app);

process.on("uncaughtException", (err) => {
  logger.error("Uncaught exception", { err });
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { reason });
});

const start = async () => {
  try {
    // ensure data deps are up before listening
    await connectMongo();

    server.listen(env.PORT, () => {
      logger.info(`Rentals server listening on :${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (err: unknown) {
    logger.error("Startup failed", {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  }
};

const shutdown = (signal: NodeJS.Signals) => {
  logger.warn(`Received ${signal}, shutting down...`);
  void closeMongo()
    .catch((err: unknown) => logger.error("Mongo close failed", { err }))
    .finally(() => {
      server.close(() => {
        logger.info("Server closed");
        process.exit(0);
      });
      setTimeout(() => {
        logger.error("Forced shutdown");
        process.exit(1);
      }, 10_000).unref();
    });
};

(["SIGINT", "SIGTERM"] as const).forEach((sig) => process.on(sig, () => shutdown(sig)));

void start();
