import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { CertificateError } from "../errors";
import { logger } from "../logger";

export function zodFieldErrors(err: ZodError): Record<string, string[]> {
  return Object.fromEntries(
    err.issues.reduce<Map<string, string[]>>((map, issue) => {
      const key = issue.path.join(".") || "_error";
      const arr = map.get(key) ?? [];
      arr.push(issue.message);
      map.set(key, arr);
      return map;
    }, new Map())
  );
}

export function sendCertificateError(res: Response, err: CertificateError) {
  return res.fail(err.code, err.message, {
    status: err.status,
    hint: err.retryable ? "retry the request" : undefined,
  });
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  // Zod validation errors
  if (err instanceof ZodError) {
    return res.fail("VALIDATION_ERROR", "Invalid request", { status: 422, fields: zodFieldErrors(err) });
  }

  if (err instanceof CertificateError) {
    return sendCertificateError(res, err);
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && "body" in err) {
    return res.fail("INVALID_JSON", "Request body is not valid JSON", { status: 400 });
  }

  // Generic errors
  logger.error({ msg: "Unhandled error", err });
  return res.fail("INTERNAL_ERROR", "Something went wrong", { status: 500 });
}
