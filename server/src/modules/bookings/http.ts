/** Response shaping for bookings. */
import type { Booking, BookingStatus } from "../../domain/index.js";

export type BookingDto = {
  id: string;
  start: string;
  end: string;
  status: BookingStatus;
  booker: { id: string };
  item: { id: string; name: string };
};

export function toBookingDto(b: Booking): BookingDto {
  return {
    id: b.id,
    start: b.start.toISOString(),
    end: b.end.toISOString(),
    status: b.status,
    booker: { id: b.bookerId },
    item: { id: b.item.id, name: b.item.name },
  };
}
