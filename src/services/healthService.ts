import mongoose from "mongoose";

export type HealthStatus = "healthy" | "unhealthy";

export interface HealthCheck {
  status: HealthStatus;
  mongo: boolean;
  uptime: number;
}

export function getHealthCheck(): HealthCheck {
  const mongoConnected = mongoose.connection.readyState === 1;

  return {
    status: mongoConnected ? "healthy" : "unhealthy",
    mongo: mongoConnected,
    uptime: process.uptime(),
  };
}
