/** Booking persistence port + its mongoose adapter. */
import mongoose from "mongoose";

import { BookingModel, type BookingDoc } from "./model.js";
import type { Booking, BookingDraft } from "../../domain/index.js";
import type { ItemDoc } from "../items/model.js";
import { toItem } from "../items/store.js";

export interface BookingStore {
  /** Inserts a draft (assigning its id) or updates an existing booking in place. */
  save(booking: BookingDraft | Booking): Promise<Booking>;
  findById(id: string): Promise<Booking | null>;
  /** Bookings of the item whose window may contain `at`; callers re-check the window. */
  findActiveNowByItemId(itemId: string, at: Date): Promise<Booking[]>;
  /** Newest start first. */
  findAllByBookerSortedByStart(userId: string): Promise<Booking[]>;
  /** Newest start first. */
  findAllByOwnerSortedByStart(userId: string): Promise<Booking[]>;
}

type PopulatedBooking = Pick<BookingDoc, "_id" | "bookerId" | "start" | "end" | "status"> & {
  itemId: ItemDoc | null;
};

function toBooking(doc: PopulatedBooking): Booking | null {
  // item removed out from under the booking
  if (!doc.itemId) return null;
  return {
    id: String(doc._id),
    start: doc.start,
    end: doc.end,
    item: toItem(doc.itemId),
    bookerId: String(doc.bookerId),
    status: doc.status,
  };
}

function toBookings(docs: PopulatedBooking[]): Booking[] {
  return docs.flatMap((d) => {
    const b = toBooking(d);
    return b ? [b] : [];
  });
}

export const mongoBookingStore: BookingStore = {
  async save(booking) {
    if ("id" in booking) {
      const doc = await BookingModel.findByIdAndUpdate(
        booking.id,
        { $set: { start: booking.start, end: booking.end, status: booking.status } },
        { new: true, runValidators: true }
      );
      if (!doc) throw new Error(`Booking ${booking.id} disappeared before update`);
      return { ...booking, start: doc.start, end: doc.end, status: doc.status };
    }

    const doc = await BookingModel.create({
      itemId: new mongoose.Types.ObjectId(booking.item.id),
      bookerId: new mongoose.Types.ObjectId(booking.bookerId),
      ownerId: new mongoose.Types.ObjectId(booking.item.ownerId),
      start: booking.start,
      end: booking.end,
      status: booking.status,
    });
    return { ...booking, id: String(doc._id) };
  },

  async findById(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await BookingModel.findById(id).populate<{ itemId: ItemDoc | null }>("itemId");
    return doc ? toBooking(doc) : null;
  },

  async findActiveNowByItemId(itemId, at) {
    if (!mongoose.isValidObjectId(itemId)) return [];
    const docs = await BookingModel.find({ itemId, start: { $lt: at }, end: { $gt: at } }).populate<{
      itemId: ItemDoc | null;
    }>("itemId");
    return toBookings(docs);
  },

  async findAllByBookerSortedByStart(userId) {
    if (!mongoose.isValidObjectId(userId)) return [];
    const docs = await BookingModel.find({ bookerId: userId })
      .sort({ start: -1 })
      .populate<{ itemId: ItemDoc | null }>("itemId");
    return toBookings(docs);
  },

  async findAllByOwnerSortedByStart(userId) {
    if (!mongoose.isValidObjectId(userId)) return [];
    const docs = await BookingModel.find({ ownerId: userId })
      .sort({ start: -1 })
      .populate<{ itemId: ItemDoc | null }>("itemId");
    return toBookings(docs);
  },
};
