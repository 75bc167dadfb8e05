// server/src/routes.ts
/** API surface: health endpoints plus the bookings router. */
import { Router } from "express";

import { pingMongo } from "./config/db.js";
import { bookingsRouter } from "./modules/bookings/routes.js";
import type { BookingService } from "./modules/bookings/service.js";
import { asyncHandler, jsonOk } from "./utils/http.js";

export type RouterDeps = {
  bookings: BookingService;
  /** Dependency pings for /health/deps; defaults to MongoDB. */
  pingDeps?: () => Promise<{ status: "ok" | "error"; message?: string }>;
};

export function createRouter({ bookings, pingDeps = pingMongo }: RouterDeps) {
  const router = Router();

  // Feature mounts
  router.use("/bookings", bookingsRouter(bookings));

  // Basic health (no deps)
  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const uptime = process.uptime();
      const version = process.env.npm_package_version || "0.0.0";
      jsonOk(res, { status: "ok", uptime, version });
    })
  );

  // Dependencies health (actual pings)
  router.get(
    "/health/deps",
    asyncHandler(async (_req, res) => {
      const mongo = await pingDeps();
      const result: { mongo: "ok" | "error"; details?: { mongo?: string } } = { mongo: mongo.status };
      if (mongo.status === "error") result.details = { mongo: mongo.message };
      jsonOk(res, result);
    })
  );

  return router;
}
