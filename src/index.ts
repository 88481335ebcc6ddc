import http from "http";
import { env } from "./shared/config/env";
import { initSentry, captureFatal } from "./observability/sentry";
import { logger } from "./shared/logger";
import { connectMongo, disconnectMongo, ensureCertificateIndexes } from "./db/mongoose";
import { buildApp } from "./api/server";
import "./shared/bootstrap";

initSentry();

async function start() {
  await connectMongo();
  await ensureCertificateIndexes();

  const app = buildApp();
  const httpServer = http.createServer(app);

  httpServer.listen(env.PORT, () => {
    logger.info({ msg: "API listening", port: env.PORT, env: env.NODE_ENV });
  });

  const shutdown = (signal: string) => {
    logger.info({ msg: "Shutting down", signal });
    httpServer.close(() => {
      disconnectMongo()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ msg: "Mongo disconnect failed", err });
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

process.on("unhandledRejection", (reason) => {
  logger.error({ msg: "unhandledRejection", reason });
});

process.on("uncaughtException", (err) => {
  logger.fatal({ msg: "uncaughtException", err });
  captureFatal(err);
  process.exit(1);
});

start().catch((err) => {
  logger.fatal({ msg: "Failed to start server", err });
  captureFatal(err);
  process.exit(1);
});
