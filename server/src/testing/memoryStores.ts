/** In-process stand-ins for the Mongo stores, used by tests. */
import type { Booking, BookingDraft, Item } from "../domain/index.js";
import type { BookingStore } from "../modules/bookings/store.js";
import type { ItemStore } from "../modules/items/store.js";
import type { UserStore } from "../modules/users/store.js";

export class MemoryUserStore implements UserStore {
  private readonly ids: Set<string>;

  constructor(ids: string[] = []) {
    this.ids = new Set(ids);
  }

  add(id: string) {
    this.ids.add(id);
  }

  async exists(id: string) {
    return this.ids.has(id);
  }
}

export class MemoryItemStore implements ItemStore {
  private readonly items = new Map<string, Item>();

  constructor(items: Item[] = []) {
    items.forEach((i) => this.put(i));
  }

  put(item: Item) {
    this.items.set(item.id, { ...item });
  }

  async findById(id: string) {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }
}

const copy = (b: Booking): Booking => ({ ...b, item: { ...b.item } });
const newestFirst = (a: Booking, b: Booking) => b.start.getTime() - a.start.getTime();

/** Ids are "1", "2", ... in save order. */
export class MemoryBookingStore implements BookingStore {
  private readonly rows = new Map<string, Booking>();
  private seq = 0;

  async save(booking: BookingDraft | Booking) {
    const row: Booking = "id" in booking ? copy(booking) : copy({ ...booking, id: String(++this.seq) });
    this.rows.set(row.id, row);
    return copy(row);
  }

  async findById(id: string) {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async findActiveNowByItemId(itemId: string, at: Date) {
    return this.all().filter((b) => b.item.id === itemId && b.start < at && b.end > at);
  }

  async findAllByBookerSortedByStart(userId: string) {
    return this.all()
      .filter((b) => b.bookerId === userId)
      .sort(newestFirst);
  }

  async findAllByOwnerSortedByStart(userId: string) {
    return this.all()
      .filter((b) => b.item.ownerId === userId)
      .sort(newestFirst);
  }

  private all() {
    return [...this.rows.values()].map(copy);
  }
}
