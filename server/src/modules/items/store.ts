import mongoose from "mongoose";

import { ItemModel, type ItemDoc } from "./model.js";
import type { Item } from "../../domain/index.js";

export interface ItemStore {
  findById(id: string): Promise<Item | null>;
}

export function toItem(doc: Pick<ItemDoc, "_id" | "name" | "description" | "available" | "ownerId">): Item {
  return {
    id: String(doc._id),
    name: doc.name,
    description: doc.description,
    ownerId: String(doc.ownerId),
    available: doc.available,
  };
}

export const mongoItemStore: ItemStore = {
  async findById(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await ItemModel.findById(id);
    return doc ? toItem(doc) : null;
  },
};
