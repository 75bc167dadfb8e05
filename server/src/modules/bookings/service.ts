// src/modules/bookings/service.ts
import { parseStateFilter, stateMatcher } from "./stateFilter.js";
import type { BookingStore } from "./store.js";
import { logger } from "../../config/logger.js";
import {
  AccessDeniedError,
  InvalidRequestError,
  NotFoundError,
  UnsupportedStateError,
  type Booking,
  type DomainError,
  type NewBookingInput,
} from "../../domain/index.js";
import { systemClock, type Clock } from "../../utils/clock.js";
import type { ItemStore } from "../items/store.js";
import type { UserStore } from "../users/store.js";

export type BookingServiceDeps = {
  users: UserStore;
  items: ItemStore;
  bookings: BookingStore;
  clock?: Clock;
};

/** Every rejection is logged before it propagates. */
function reject(err: DomainError, meta?: Record<string, unknown>): never {
  logger.warn(err.message, { kind: err.kind, ...meta });
  throw err;
}

function logTransition(kind: "created" | "approved" | "rejected" | "viewed", b: Booking, actorId: string) {
  logger.info(`Booking for item '${b.item.name}' (id=${b.item.id}) ${kind}`, {
    event: `booking.${kind}`,
    bookingId: b.id,
    actorId,
    status: b.status,
  });
}

/** Booking lifecycle: rental requests, owner decisions, guarded reads and filtered listings. */
export function createBookingService(deps: BookingServiceDeps) {
  const { users, items, bookings, clock = systemClock } = deps;

  async function assertUserExists(userId: string) {
    if (!(await users.exists(userId))) {
      reject(new NotFoundError(`User with id=${userId} not found.`), { userId });
    }
  }

  async function requireBooking(bookingId: string): Promise<Booking> {
    const booking = await bookings.findById(bookingId);
    if (!booking) reject(new NotFoundError(`Booking with id=${bookingId} not found.`), { bookingId });
    return booking;
  }

  /** Rental request from `bookerId`; stored as WAITING until the owner answers. */
  async function add(input: NewBookingInput, bookerId: string): Promise<Booking> {
    await assertUserExists(bookerId);

    if (input.start >= input.end) {
      reject(new InvalidRequestError("Rental start must be before its end."), {
        start: input.start.toISOString(),
        end: input.end.toISOString(),
      });
    }

    const item = await items.findById(input.itemId);
    if (!item) reject(new NotFoundError(`Item with id=${input.itemId} not found.`), { itemId: input.itemId });

    // reported as not-found to callers
    if (item.ownerId === bookerId) {
      reject(new AccessDeniedError("Item owners cannot rent their own items."), { itemId: item.id, bookerId });
    }

    if (!item.available) {
      reject(new InvalidRequestError(`Item with id=${item.id} is not available for rent.`), { itemId: item.id });
    }

    // only "is it rented right now" is checked, not overlap with the requested window
    const active = await bookings.findActiveNowByItemId(item.id, clock.now());
    if (active.some((b) => b.start < clock.now() && b.end > clock.now())) {
      reject(new InvalidRequestError(`Item with id=${item.id} is already rented. Try again later.`), {
        itemId: item.id,
      });
    }

    const saved = await bookings.save({
      start: input.start,
      end: input.end,
      item,
      bookerId,
      status: "WAITING",
    });
    logTransition("created", saved, bookerId);
    return saved;
  }

  /** Owner decision. An APPROVED booking is final; REJECTED may be answered again. */
  async function approve(bookingId: string, ownerId: string, approved: boolean): Promise<Booking> {
    await assertUserExists(ownerId);
    const booking = await requireBooking(bookingId);

    if (booking.item.ownerId !== ownerId) {
      reject(new AccessDeniedError("Only the item owner can approve or reject a booking."), {
        bookingId,
        ownerId,
      });
    }
    if (booking.status === "APPROVED") {
      reject(new InvalidRequestError("Booking has already been approved."), { bookingId });
    }

    const saved = await bookings.save({ ...booking, status: approved ? "APPROVED" : "REJECTED" });
    logTransition(approved ? "approved" : "rejected", saved, ownerId);
    return saved;
  }

  /** Visible to the booker and the item owner only. */
  async function get(bookingId: string, userId: string): Promise<Booking> {
    await assertUserExists(userId);
    const booking = await requireBooking(bookingId);

    if (booking.item.ownerId !== userId && booking.bookerId !== userId) {
      reject(new AccessDeniedError("Only the booker or the item owner can view a booking."), {
        bookingId,
        userId,
      });
    }

    logTransition("viewed", booking, userId);
    return booking;
  }

  function filterByState(list: Booking[], token: string): Booking[] {
    const parsed = parseStateFilter(token);
    if (parsed.kind === "unrecognized") reject(new UnsupportedStateError(parsed.token));
    return list.filter(stateMatcher(parsed.state, clock));
  }

  async function getAllByBooker(userId: string, state: string): Promise<Booking[]> {
    await assertUserExists(userId);
    return filterByState(await bookings.findAllByBookerSortedByStart(userId), state);
  }

  async function getAllByOwner(ownerId: string, state: string): Promise<Booking[]> {
    await assertUserExists(ownerId);
    return filterByState(await bookings.findAllByOwnerSortedByStart(ownerId), state);
  }

  return { add, approve, get, getAllByBooker, getAllByOwner };
}

export type BookingService = ReturnType<typeof createBookingService>;
