import { Router } from "express";

import { toBookingDto } from "./http.js";
import { ApproveQuery, BookingIdParam, CreateBookingSchema, ListQuery } from "./schemas.js";
import type { BookingService } from "./service.js";
import { getAuth, requireUser } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";

export function bookingsRouter(service: BookingService) {
  const router = Router();

  router.use(requireUser);

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(res);
      const body = CreateBookingSchema.parse(req.body);
      const booking = await service.add(body, userId);
      jsonOk(res, toBookingDto(booking));
    })
  );

  // before "/:bookingId" so "owner" is not taken for an id
  router.get(
    "/owner",
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(res);
      const { state } = ListQuery.parse(req.query);
      const list = await service.getAllByOwner(userId, state);
      jsonOk(res, list.map(toBookingDto));
    })
  );

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(res);
      const { state } = ListQuery.parse(req.query);
      const list = await service.getAllByBooker(userId, state);
      jsonOk(res, list.map(toBookingDto));
    })
  );

  router.patch(
    "/:bookingId",
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(res);
      const { bookingId } = BookingIdParam.parse(req.params);
      const { approved } = ApproveQuery.parse(req.query);
      const booking = await service.approve(bookingId, userId, approved);
      jsonOk(res, toBookingDto(booking));
    })
  );

  router.get(
    "/:bookingId",
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(res);
      const { bookingId } = BookingIdParam.parse(req.params);
      const booking = await service.get(bookingId, userId);
      jsonOk(res, toBookingDto(booking));
    })
  );

  return router;
}
