import type { Request, Response, NextFunction } from "express";
import type { FailOptions } from "../../types/express";

function buildMeta(res: Response, extra?: Record<string, unknown>) {
  return {
    requestId: res.locals.requestId,
    ts: new Date().toISOString(),
    ...(extra ?? {}),
  };
}

export function envelope(_req: Request, res: Response, next: NextFunction) {
  res.success = (data?: unknown, message = "ok", meta?: Record<string, unknown>) => {
    if (res.headersSent) return res;
    return res.json({
      message,
      variant: "success",
      myData: data ?? null,
      meta: buildMeta(res, meta),
    });
  };

  res.fail = (code: string, message: string, options: FailOptions = {}) => {
    if (res.headersSent) return res;
    return res.status(options.status ?? 400).json({
      error: {
        code,
        message,
        hint: options.hint,
        fields: options.fields,
      },
      meta: buildMeta(res, options.meta),
    });
  };

  next();
}
