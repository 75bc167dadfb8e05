import { strict as assert } from "node:assert";
import { once } from "node:events";
import type { Server } from "node:http";
import { after, before, describe, it } from "node:test";

import { z } from "zod";

import { createBookingService } from "./service.js";
import { createApp } from "../../app.js";
import { MemoryBookingStore, MemoryItemStore, MemoryUserStore } from "../../testing/memoryStores.js";
import { fixedClock } from "../../utils/clock.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");
const at = (hours: number) => new Date(NOW.getTime() + hours * 3_600_000).toISOString();

const ErrorBody = z.object({ error: z.object({ code: z.string(), message: z.string() }) });
const BookingBody = z.object({ id: z.string(), status: z.string() });

const errorOf = (body: unknown) => ErrorBody.parse(body).error;
const bookingOf = (body: unknown) => BookingBody.parse(body);
const idsOf = (body: unknown) => z.array(BookingBody).parse(body).map((b) => b.id);

describe("bookings http", () => {
  const service = createBookingService({
    users: new MemoryUserStore(["u1", "u2", "u3"]),
    items: new MemoryItemStore([{ id: "i1", name: "Drill", ownerId: "u1", available: true }]),
    bookings: new MemoryBookingStore(),
    clock: fixedClock(NOW),
  });
  const app = createApp({
    bookings: service,
    pingDeps: async () => ({ status: "ok" }),
  });
  let server: Server;
  let base = "";

  before(async () => {
    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("server has no port");
    base = `http://127.0.0.1:${addr.port}`;
  });

  after(() => {
    server.closeAllConnections();
    server.close();
  });

  async function call(method: string, path: string, userId?: string, body?: unknown) {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (userId) headers["X-Sharer-User-Id"] = userId;
    const res = await fetch(`${base}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const json: unknown = await res.json();
    return { status: res.status, body: json };
  }

  it("requires the user header", async () => {
    const res = await call("GET", "/bookings");
    assert.equal(res.status, 401);
    assert.equal(errorOf(res.body).code, "UNAUTHORIZED");
  });

  it("creates a booking and returns its DTO", async () => {
    const res = await call("POST", "/bookings", "u2", { itemId: "i1", start: at(1), end: at(2) });
    assert.equal(res.status, 200);
    assert.deepEqual(res.body, {
      id: "1",
      start: "2026-03-01T13:00:00.000Z",
      end: "2026-03-01T14:00:00.000Z",
      status: "WAITING",
      booker: { id: "u2" },
      item: { id: "i1", name: "Drill" },
    });
  });

  it("rejects a malformed body with 422", async () => {
    const res = await call("POST", "/bookings", "u2", { itemId: "i1", start: "tomorrow", end: at(2) });
    assert.equal(res.status, 422);
    assert.equal(errorOf(res.body).code, "UNPROCESSABLE_ENTITY");
  });

  it("answers a body that is not JSON with 400", async () => {
    const res = await fetch(`${base}/bookings`, {
      method: "POST",
      headers: { "content-type": "application/json", "X-Sharer-User-Id": "u2" },
      body: "{bad",
    });
    assert.equal(res.status, 400);
    assert.equal(errorOf(await res.json()).code, "BAD_REQUEST");
  });

  it("answers an oversized body with 413", async () => {
    const res = await call("POST", "/bookings", "u2", { itemId: "i1", note: "x".repeat(1_100_000) });
    assert.equal(res.status, 413);
    assert.equal(errorOf(res.body).code, "PAYLOAD_TOO_LARGE");
  });

  it("maps a reversed window to 400", async () => {
    const res = await call("POST", "/bookings", "u2", { itemId: "i1", start: at(3), end: at(2) });
    assert.equal(res.status, 400);
    assert.equal(errorOf(res.body).code, "INVALID_REQUEST");
    assert.equal(errorOf(res.body).message, "Rental start must be before its end.");
  });

  it("reports a non-owner approval as 404", async () => {
    const res = await call("PATCH", "/bookings/1?approved=true", "u2");
    assert.equal(res.status, 404);
    assert.equal(errorOf(res.body).code, "NOT_FOUND");
  });

  it("lets the owner approve once", async () => {
    const ok = await call("PATCH", "/bookings/1?approved=true", "u1");
    assert.equal(ok.status, 200);
    assert.equal(bookingOf(ok.body).status, "APPROVED");

    const again = await call("PATCH", "/bookings/1?approved=false", "u1");
    assert.equal(again.status, 400);
    assert.equal(errorOf(again.body).code, "INVALID_REQUEST");
  });

  it("requires approved to be true or false", async () => {
    const res = await call("PATCH", "/bookings/1?approved=yes", "u1");
    assert.equal(res.status, 422);
  });

  it("hides a booking from strangers", async () => {
    const res = await call("GET", "/bookings/1", "u3");
    assert.equal(res.status, 404);
    assert.equal(errorOf(res.body).code, "NOT_FOUND");

    const mine = await call("GET", "/bookings/1", "u2");
    assert.equal(mine.status, 200);
    assert.equal(bookingOf(mine.body).id, "1");
  });

  it("lists by booker and by owner", async () => {
    const byBooker = await call("GET", "/bookings?state=FUTURE", "u2");
    assert.equal(byBooker.status, 200);
    assert.deepEqual(idsOf(byBooker.body), ["1"]);

    const byOwner = await call("GET", "/bookings/owner", "u1");
    assert.equal(byOwner.status, 200);
    assert.deepEqual(idsOf(byOwner.body), ["1"]);

    const none = await call("GET", "/bookings/owner?state=PAST", "u1");
    assert.deepEqual(none.body, []);
  });

  it("answers unknown states with UNSUPPORTED_STATE", async () => {
    const res = await call("GET", "/bookings?state=BOGUS", "u2");
    assert.equal(res.status, 400);
    assert.equal(errorOf(res.body).code, "UNSUPPORTED_STATE");
    assert.equal(errorOf(res.body).message, "Unknown state: BOGUS");
  });

  it("reports unknown users as 404", async () => {
    const res = await call("GET", "/bookings/owner", "ghost");
    assert.equal(res.status, 404);
    assert.equal(errorOf(res.body).message, "User with id=ghost not found.");
  });

  it("serves health and a 404 for unknown routes", async () => {
    const health = await call("GET", "/health");
    assert.equal(health.status, 200);
    assert.equal(z.object({ status: z.string() }).parse(health.body).status, "ok");

    const deps = await call("GET", "/health/deps");
    assert.deepEqual(deps.body, { mongo: "ok" });

    const missing = await call("GET", "/nope");
    assert.equal(missing.status, 404);
    assert.equal(errorOf(missing.body).message, "Route GET /nope not found");
  });
});
