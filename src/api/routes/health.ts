import { Router, type Request, type Response } from "express";
import { getHealthCheck } from "../../services/healthService";

export const healthRouter = Router();

const healthResponder = (_req: Request, res: Response) =>
  res.success({ status: "ok", timestamp: new Date().toISOString() }, "health ok");

healthRouter.get("/health", healthResponder);
healthRouter.get("/api/v1/health", healthResponder);

healthRouter.get("/readiness", (_req, res) => {
  const check = getHealthCheck();
  if (check.status === "healthy") {
    return res.success({ checks: { mongo: check.mongo }, uptime: check.uptime }, "ready");
  }
  return res.fail("NOT_READY", "Dependencies not ready", {
    status: 503,
    meta: { checks: { mongo: check.mongo }, uptime: check.uptime },
  });
});
