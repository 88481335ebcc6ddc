import "express-serve-static-core";

declare module "express-serve-static-core" {
  interface Request {
    requestId?: string;
  }

  interface Response {
    success(data?: unknown, message?: string, meta?: Record<string, unknown>): Response;
    fail(code: string, message: string, options?: FailOptions): Response;
  }
}

export interface FailOptions {
  hint?: string;
  fields?: Record<string, string[]>;
  status?: number;
  meta?: Record<string, unknown>;
}
