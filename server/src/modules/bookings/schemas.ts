// src/modules/bookings/schemas.ts
import { z } from "zod";

export const CreateBookingSchema = z.object({
  itemId: z.union([z.string().trim().min(1), z.number().int().transform(String)]),
  start: z.string().datetime({ offset: true, local: true }).pipe(z.coerce.date()),
  end: z.string().datetime({ offset: true, local: true }).pipe(z.coerce.date()),
});

export type CreateBookingBody = z.infer<typeof CreateBookingSchema>;

export const ApproveQuery = z.object({
  approved: z.enum(["true", "false"]).transform((v) => v === "true"),
});

export const ListQuery = z.object({
  // validated by the service so unknown tokens surface as UNSUPPORTED_STATE
  state: z.string().default("ALL"),
});

export const BookingIdParam = z.object({ bookingId: z.string().min(1) });
