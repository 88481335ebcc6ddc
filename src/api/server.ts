import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import pinoHttp from "pino-http";
import { logger } from "../shared/logger";
import { env } from "../shared/config/env";
import { container } from "../shared/container";
import { requestContext } from "../shared/middleware/requestContext";
import { envelope } from "../shared/middleware/envelope";
import { errorHandler } from "../shared/middleware/errorHandler";
import { healthRouter } from "./routes/health";
import { metricsRouter, apiRequestDuration } from "./routes/metrics";
import { createCertificatesRouter } from "./routes/v1/certificates";
import type { CertificateIssuanceService } from "../services/certificateIssuanceService";

export interface AppOptions {
  /** Defaults to the service registered in the container. */
  issuanceService?: CertificateIssuanceService;
  adminApiKey?: string;
}

function corsOrigin(): string[] | boolean {
  if (!env.CORS_ORIGIN) return true;
  return env.CORS_ORIGIN.split(",").map((origin) => origin.trim()).filter(Boolean);
}

export function buildApp(options: AppOptions = {}) {
  const app = express();
  const issuanceService =
    options.issuanceService ?? container.resolve<CertificateIssuanceService>("certificateIssuanceService");
  const adminApiKey = "adminApiKey" in options ? options.adminApiKey : env.ADMIN_API_KEY;

  app.disable("x-powered-by");
  app.use(helmet());
  app.use(
    cors({
      origin: corsOrigin(),
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Accept", "X-Admin-Key", "X-Request-ID"],
      exposedHeaders: ["X-Request-ID", "X-Certificate-Id", "X-Verification-Code", "Content-Disposition"],
    })
  );
  app.use(compression());
  app.use(express.json({ limit: "100kb" }));

  app.use(requestContext);

  app.use(
    pinoHttp({
      logger,
      customProps: (req, res) => ({
        requestId: res.getHeader("x-request-id"),
        route: req.url,
        status: res.statusCode,
      }),
    })
  );

  app.use(envelope);

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
      const routeLabel =
        (req.baseUrl ? `${req.baseUrl}${req.route?.path || ""}` : req.route?.path) || "unmatched";
      apiRequestDuration.labels(req.method, routeLabel, String(res.statusCode)).observe(durationSeconds);
    });
    next();
  });

  app.use(healthRouter);
  app.use(metricsRouter);

  app.use("/api/v1/certificates", createCertificatesRouter(issuanceService, { adminApiKey }));

  app.use((req, res) => {
    res.fail("NOT_FOUND", `Route ${req.originalUrl} not found`, { status: 404 });
  });

  app.use(errorHandler);

  return app;
}
