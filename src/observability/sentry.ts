import * as Sentry from "@sentry/node";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger";

export function initSentry(): void {
  if (!env.SENTRY_DSN) return;
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    release: env.APP_NAME,
    tracesSampleRate: env.NODE_ENV === "production" ? 0.1 : 1.0,
  });
  logger.info({ msg: "Sentry initialised" });
}

export function captureFatal(err: unknown): void {
  if (!env.SENTRY_DSN) return;
  Sentry.captureException(err);
}
