// server/src/middlewares/notFound.ts
/** 404 for unmatched routes, in the same payload shape as domain not-found errors. */

import type { RequestHandler } from "express";

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({
    error: {
      code: "NOT_FOUND",
      message: `Route ${req.method} ${req.originalUrl} not found`,
      requestId: res.locals.requestId,
    },
  });
};
