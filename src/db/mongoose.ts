import mongoose from "mongoose";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger";
import { CertificateModel } from "../models/certificate";

export async function connectMongo(): Promise<typeof mongoose> {
  const uri = env.MONGODB_URI;
  mongoose.set("strictQuery", true);
  mongoose.connection.on("connected", () => logger.info({ msg: "Mongo connected" }));
  mongoose.connection.on("disconnected", () => logger.warn({ msg: "Mongo disconnected" }));
  mongoose.connection.on("error", (err) => logger.error({ msg: "Mongo error", err }));
  return mongoose.connect(uri, {
    serverSelectionTimeoutMS: env.MONGO_SERVER_SELECTION_TIMEOUT_MS,
    maxPoolSize: 10,
    // Fail fast instead of queueing operations while disconnected
    bufferCommands: false,
  });
}

/**
 * Builds the certificate indexes before the API accepts traffic. The unique
 * index on certificateId is what keeps concurrent issuance correct, so a
 * failure here aborts startup.
 */
export async function ensureCertificateIndexes(): Promise<void> {
  await CertificateModel.init();
  logger.info({ msg: "Certificate indexes ready" });
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}
