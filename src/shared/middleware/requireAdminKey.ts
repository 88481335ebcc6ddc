import type { Request, Response, NextFunction } from "express";
import { createHash, timingSafeEqual } from "crypto";

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

export function adminKeyMatches(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Guards the administrative certificate routes with a shared key sent as
 * `X-Admin-Key`. Without a configured key the routes stay open.
 */
export function requireAdminKey(expectedKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedKey) return next();
    const provided = req.header("x-admin-key") ?? "";
    if (!adminKeyMatches(provided, expectedKey)) {
      return res.fail("UNAUTHORIZED", "admin key required", { status: 401 });
    }
    return next();
  };
}
