import type { BookingStatus } from "./enums.js";

/** Rentable item as the booking core sees it (read-only). */
export type Item = {
  id: string;
  name: string;
  description?: string;
  ownerId: string;
  available: boolean;
};

export type Booking = {
  id: string;
  start: Date;
  end: Date;
  item: Item;
  bookerId: string;
  status: BookingStatus;
};

/** A booking before its first save; the store assigns the id. */
export type BookingDraft = Omit<Booking, "id">;

export type NewBookingInput = {
  itemId: string;
  start: Date;
  end: Date;
};
