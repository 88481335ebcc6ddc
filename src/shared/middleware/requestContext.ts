import type { Request, Response, NextFunction } from "express";
import { nanoid } from "nanoid";

const MAX_REQUEST_ID_LENGTH = 128;

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const incomingId = req.header("x-request-id");
  const requestId =
    incomingId && incomingId.length > 0 && incomingId.length <= MAX_REQUEST_ID_LENGTH ? incomingId : nanoid(12);
  req.requestId = requestId;
  res.locals.requestId = requestId;
  res.setHeader("X-Request-ID", requestId);
  next();
}
