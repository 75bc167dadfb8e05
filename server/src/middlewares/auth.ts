import type { Request, Response, NextFunction } from "express";

export const USER_ID_HEADER = "X-Sharer-User-Id";

export type AuthContext = { userId: string };

/** Callers identify themselves by header; whether the user exists is the service's call. */
export function requireUser(req: Request, res: Response, next: NextFunction) {
  const userId = req.get(USER_ID_HEADER)?.trim();
  if (!userId) {
    return res
      .status(401)
      .json({ error: { code: "UNAUTHORIZED", message: `Missing ${USER_ID_HEADER} header` } });
  }
  res.locals.auth = { userId } satisfies AuthContext;
  next();
}

export function getAuth(res: Response): AuthContext {
  const ctx: unknown = res.locals.auth;
  if (!ctx || typeof ctx !== "object" || !("userId" in ctx) || typeof ctx.userId !== "string") {
    throw new Error("Auth context missing (requireUser not applied)");
  }
  return { userId: ctx.userId };
}
