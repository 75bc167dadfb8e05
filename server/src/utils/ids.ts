// server/src/utils/ids.ts
/** Tags each request with an x-request-id (reusing a well-formed inbound one) for log correlation. */

import { randomUUID } from "crypto";

import type { RequestHandler } from "express";

const INBOUND_ID = /^[A-Za-z0-9_-]{8,64}$/;

export const requestId: RequestHandler = (req, res, next) => {
  const inbound = req.get("x-request-id");
  const id = inbound && INBOUND_ID.test(inbound) ? inbound : randomUUID();
  // store on res.locals to avoid extending Request types
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
};
