import { Router, type NextFunction, type Request, type Response } from "express";
import type { CertificateIssuanceService } from "../../../services/certificateIssuanceService";
import type { RenderedCertificate } from "../../../services/certificateRenderer";
import {
  certificateIdParamSchema,
  certificateStatsSchema,
  issueCertificateSchema,
  listCertificatesSchema,
} from "../../../shared/validation/certificateValidation";
import { requireAdminKey } from "../../../shared/middleware/requireAdminKey";
import { sendCertificateError } from "../../../shared/middleware/errorHandler";
import { certificatesIssued } from "../metrics";

export interface CertificatesRouterOptions {
  adminApiKey?: string;
}

function wantsPdf(req: Request): boolean {
  return req.accepts(["application/json", "application/pdf"]) === "application/pdf";
}

function sendPdf(res: Response, certificateId: string, rendered: RenderedCertificate) {
  res.setHeader("Content-Type", "application/pdf");
  res.setHeader("Content-Disposition", `attachment; filename="certificate_${certificateId}.pdf"`);
  res.setHeader("X-Certificate-Id", certificateId);
  res.setHeader("X-Verification-Code", rendered.verificationCodeEmbedded ? "embedded" : "omitted");
  return res.send(rendered.pdf);
}

export function createCertificatesRouter(
  service: CertificateIssuanceService,
  options: CertificatesRouterOptions = {}
): Router {
  const router = Router();
  // Per route, so unknown paths fall through to the 404 handler.
  const adminOnly = requireAdminKey(options.adminApiKey);

  // ─── GET /verify/:certificateId (public) ─────────────────────────────────

  router.get("/verify/:certificateId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { certificateId } = certificateIdParamSchema.parse(req.params);
      const result = await service.verify(certificateId);
      if (!result.ok) return sendCertificateError(res, result.error);
      if (!result.value) {
        return res.fail("NOT_FOUND", "certificate not found", { status: 404 });
      }
      return res.success({ valid: true, certificate: result.value }, "certificate verified");
    } catch (err) {
      return next(err);
    }
  });

  // ─── POST / issue a certificate ────────────────────────────────────────

  router.post("/", adminOnly, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = issueCertificateSchema.parse(req.body);
      const result = await service.issue(body);
      certificatesIssued.labels(result.ok ? "issued" : result.error.code).inc();
      if (!result.ok) return sendCertificateError(res, result.error);

      const { certificate, pdf, verificationCodeEmbedded } = result.value;
      if (wantsPdf(req)) {
        return sendPdf(res.status(201), certificate.certificateId, { pdf, verificationCodeEmbedded });
      }
      return res.status(201).success(
        {
          certificate,
          verificationCodeEmbedded,
          document: {
            contentType: "application/pdf",
            fileName: `certificate_${certificate.certificateId}.pdf`,
            base64: pdf.toString("base64"),
          },
        },
        "certificate issued"
      );
    } catch (err) {
      return next(err);
    }
  });

  // ─── GET / list issued certificates ────────────────────────────────────

  router.get("/", adminOnly, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listCertificatesSchema.parse(req.query);
      const result = await service.list(query);
      if (!result.ok) return sendCertificateError(res, result.error);
      return res.success(
        { certificates: result.value },
        "certificates",
        { count: result.value.length, limit: query.limit, skip: query.skip }
      );
    } catch (err) {
      return next(err);
    }
  });

  // ─── GET /stats certificate counts ───────────────────────────────────────

  router.get("/stats", adminOnly, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = certificateStatsSchema.parse(req.query);
      const result = await service.stats(query);
      if (!result.ok) return sendCertificateError(res, result.error);
      return res.success(result.value, "certificate statistics");
    } catch (err) {
      return next(err);
    }
  });

  // ─── GET /:certificateId/pdf reprint ───────────────────────────────────

  router.get("/:certificateId/pdf", adminOnly, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { certificateId } = certificateIdParamSchema.parse(req.params);
      const result = await service.renderIssued(certificateId);
      if (!result.ok) return sendCertificateError(res, result.error);
      if (!result.value) {
        return res.fail("NOT_FOUND", "certificate not found", { status: 404 });
      }
      return sendPdf(res, certificateId, result.value);
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
