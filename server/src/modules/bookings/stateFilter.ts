/** Listing filters: token parsing and the predicate each filter applies. */
import { BOOKING_STATE_FILTERS, type Booking, type BookingStateFilter } from "../../domain/index.js";
import type { Clock } from "../../utils/clock.js";

export type ParsedStateFilter =
  | { kind: "known"; state: BookingStateFilter }
  | { kind: "unrecognized"; token: string };

/** Exact, case-sensitive match against the known tokens. */
export function parseStateFilter(token: string): ParsedStateFilter {
  const state = BOOKING_STATE_FILTERS.find((s) => s === token);
  return state ? { kind: "known", state } : { kind: "unrecognized", token };
}

/** Time-based filters read the clock per booking, not once per listing. */
export function stateMatcher(state: BookingStateFilter, clock: Clock): (b: Booking) => boolean {
  switch (state) {
    case "ALL":
      return () => true;
    case "CURRENT":
      return (b) => b.start < clock.now() && b.end > clock.now();
    case "PAST":
      return (b) => b.end < clock.now();
    case "FUTURE":
      return (b) => b.start > clock.now();
    case "WAITING":
      return (b) => b.status === "WAITING";
    case "REJECTED":
      return (b) => b.status === "REJECTED";
  }
}
