import "dotenv/config";
import mongoose from "mongoose";

import { connectMongo } from "../src/config/db.js";
import { logger } from "../src/config/logger.js";
import { BookingModel } from "../src/modules/bookings/model.js";
import { ItemModel } from "../src/modules/items/model.js";
import { User } from "../src/modules/users/model.js";

async function main() {
  await connectMongo();

  // 1) Sync model indexes (creates collections if needed)
  for (const m of [User, ItemModel, BookingModel]) {
    logger.info(`syncing indexes for ${m.modelName}`);
    await m.syncIndexes();
  }

  // 2) Print what ended up on each collection
  for (const m of [User, ItemModel, BookingModel]) {
    try {
      const idx = await m.listIndexes();
      logger.info(`${m.collection.collectionName} indexes`, { indexes: idx.map((i) => i.name) });
    } catch (e: unknown) {
      logger.warn(`${m.collection.collectionName}: could not list indexes`, {
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  await mongoose.disconnect();
}

main().catch((err: unknown) => {
  logger.error("Index sync failed", { err });
  process.exit(1);
});
