/** Domain enums (string unions keep JSON clean and easy to index) */

/** Booking lifecycle: WAITING until the owner answers, then APPROVED or REJECTED. */
export type BookingStatus = "WAITING" | "APPROVED" | "REJECTED";

export const BOOKING_STATUSES = ["WAITING", "APPROVED", "REJECTED"] as const satisfies readonly BookingStatus[];

/** Filter tokens accepted by the booking listings */
export type BookingStateFilter = "ALL" | "CURRENT" | "PAST" | "FUTURE" | "WAITING" | "REJECTED";

export const BOOKING_STATE_FILTERS = [
  "ALL",
  "CURRENT",
  "PAST",
  "FUTURE",
  "WAITING",
  "REJECTED",
] as const satisfies readonly BookingStateFilter[];
