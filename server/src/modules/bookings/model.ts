import mongoose, { Schema, type Model } from "mongoose";

import { BOOKING_STATUSES, type BookingStatus } from "../../domain/index.js";

export interface BookingDoc extends mongoose.Document {
  itemId: mongoose.Types.ObjectId;
  bookerId: mongoose.Types.ObjectId;
  ownerId: mongoose.Types.ObjectId; // denormalized from Item for owner listings

  start: Date;
  end: Date;

  status: BookingStatus;

  createdAt: Date;
  updatedAt: Date;
}

const BookingSchema = new Schema<BookingDoc>(
  {
    itemId: { type: Schema.Types.ObjectId, ref: "Item", required: true },
    bookerId: { type: Schema.Types.ObjectId, ref: "User", required: true },
    ownerId: { type: Schema.Types.ObjectId, ref: "User", required: true },

    start: { type: Date, required: true },
    end: { type: Date, required: true },

    status: {
      type: String,
      enum: [...BOOKING_STATUSES],
      default: "WAITING",
      index: true,
    },
  },
  { timestamps: true, toJSON: { virtuals: true }, toObject: { virtuals: true } }
);

/** Basic time validation */
BookingSchema.pre("validate", function (next) {
  if (this.start >= this.end) {
    return next(new Error("end must be after start"));
  }
  next();
});

// Listings by role, newest start first
BookingSchema.index({ bookerId: 1, start: -1 });
BookingSchema.index({ ownerId: 1, start: -1 });
// "Currently booked" lookups
BookingSchema.index({ itemId: 1, start: 1, end: 1 });

export const BookingModel: Model<BookingDoc> =
  mongoose.models.Booking || mongoose.model<BookingDoc>("Booking", BookingSchema);
