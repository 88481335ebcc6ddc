import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { buildApp } from "../../src/api/server";
import { createCertificateIssuanceService } from "../../src/services/certificateIssuanceService";
import { createCertificateRenderer } from "../../src/services/certificateRenderer";
import { CERTIFICATE_ID_PATTERN } from "../../src/services/certificateIdService";
import { createStores, type InMemoryCertificateLedger } from "../helpers/inMemoryStores";

const ADMIN_KEY = "test-secret";

const issueBody = {
  traineeId: "T1",
  trainingId: "TR1",
  completionDate: "2024-03-01",
  venue: "Adama Hospital",
  durationLabel: "5 days",
};

describe("certificates API", () => {
  let app: Express;
  let ledger: InMemoryCertificateLedger;

  beforeEach(() => {
    const stores = createStores();
    ledger = stores.ledger;
    const issuanceService = createCertificateIssuanceService({
      ...stores,
      render: createCertificateRenderer({ verifyUrl: "https://certs.example.org/verify" }),
    });
    app = buildApp({ issuanceService, adminApiKey: ADMIN_KEY });
  });

  const issue = (body: object = issueBody) =>
    request(app).post("/api/v1/certificates").set("X-Admin-Key", ADMIN_KEY).send(body);

  // ─── POST /api/v1/certificates ────────────────────────────────────────────

  describe("POST /api/v1/certificates", () => {
    it("issues a certificate and returns the PDF as base64", async () => {
      const res = await issue();

      expect(res.status).toBe(201);
      expect(res.body.message).toBe("certificate issued");
      const { certificate, verificationCodeEmbedded, document } = res.body.myData;
      expect(certificate.certificateId).toMatch(CERTIFICATE_ID_PATTERN);
      expect(certificate.issueDate).toBe("2024-03-01");
      expect(verificationCodeEmbedded).toBe(true);
      expect(document.contentType).toBe("application/pdf");
      expect(document.fileName).toBe(`certificate_${certificate.certificateId}.pdf`);
      expect(Buffer.from(document.base64, "base64").subarray(0, 5).toString("latin1")).toBe("%PDF-");
      expect(ledger.size).toBe(1);
    });

    it("returns the raw PDF when asked for one", async () => {
      const res = await issue().set("Accept", "application/pdf").responseType("blob");

      expect(res.status).toBe(201);
      expect(res.headers["content-type"]).toBe("application/pdf");
      const certificateId = res.headers["x-certificate-id"];
      expect(certificateId).toMatch(CERTIFICATE_ID_PATTERN);
      expect(res.headers["content-disposition"]).toBe(`attachment; filename="certificate_${certificateId}.pdf"`);
      expect(res.headers["x-verification-code"]).toBe("embedded");
      expect(Buffer.isBuffer(res.body)).toBe(true);
      expect(res.body.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    });

    it("returns 404 for an unknown trainee", async () => {
      const res = await issue({ ...issueBody, traineeId: "T404" });

      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({ code: "REFERENCE_NOT_FOUND", message: "trainee T404 not found" });
      expect(ledger.size).toBe(0);
    });

    it("returns 422 with field errors for an invalid body", async () => {
      const res = await issue({ ...issueBody, completionDate: "2024-02-30", venue: "" });

      expect(res.status).toBe(422);
      expect(res.body.error.code).toBe("VALIDATION_ERROR");
      expect(res.body.error.fields).toEqual({
        completionDate: ["completionDate is not a valid calendar date"],
        venue: ["Venue must not be blank"],
      });
    });

    it("fills in the trainee's facility when the venue is omitted", async () => {
      const { venue: _venue, ...withoutVenue } = issueBody;
      const res = await issue({ ...withoutVenue, traineeId: "T2" });

      expect(res.status).toBe(201);
      expect(res.body.myData.certificate.venue).toBe("Bishoftu Health Center");
    });

    it("returns 422 when the name cannot be rendered with the built-in font", async () => {
      const stores = createStores();
      stores.trainees.trainees.set("T9", {
        traineeId: "T9",
        displayName: "አልማዝ በቀለ",
        facility: null,
        region: null,
      });
      const service = createCertificateIssuanceService({ ...stores, render: createCertificateRenderer() });
      const res = await request(buildApp({ issuanceService: service, adminApiKey: ADMIN_KEY }))
        .post("/api/v1/certificates")
        .set("X-Admin-Key", ADMIN_KEY)
        .send({ ...issueBody, traineeId: "T9" });

      expect(res.status).toBe(422);
      expect(res.body.error.code).toBe("RENDERING_FAILED");
      expect(stores.ledger.size).toBe(0);
    });

    it("returns 503 with a retry hint when the store is down", async () => {
      ledger.unavailable = true;
      const res = await issue();

      expect(res.status).toBe(503);
      expect(res.body.error).toEqual({
        code: "STORE_UNAVAILABLE",
        message: "certificate store unavailable",
        hint: "retry the request",
      });
    });

    it("rejects requests without the admin key", async () => {
      const res = await request(app).post("/api/v1/certificates").send(issueBody);

      expect(res.status).toBe(401);
      expect(res.body.error.code).toBe("UNAUTHORIZED");
      expect(ledger.size).toBe(0);
    });

    it("rejects malformed JSON", async () => {
      const res = await request(app)
        .post("/api/v1/certificates")
        .set("X-Admin-Key", ADMIN_KEY)
        .set("Content-Type", "application/json")
        .send("{not json");

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("INVALID_JSON");
    });
  });

  // ─── GET /api/v1/certificates/verify/:certificateId ───────────────────────

  describe("GET /api/v1/certificates/verify/:certificateId", () => {
    it("verifies an issued certificate without the admin key", async () => {
      const issued = await issue();
      const { certificateId } = issued.body.myData.certificate;

      const res = await request(app).get(`/api/v1/certificates/verify/${certificateId}`);

      expect(res.status).toBe(200);
      expect(res.body.message).toBe("certificate verified");
      expect(res.body.myData.valid).toBe(true);
      expect(res.body.myData.certificate).toMatchObject({
        certificateId,
        traineeId: "T1",
        trainingId: "TR1",
        issueDate: "2024-03-01",
        venue: "Adama Hospital",
        durationLabel: "5 days",
        traineeName: "Almaz Bekele Tadesse",
        trainingTitle: "Immunization in Practice",
        trainingType: "EPI",
      });
    });

    it("returns 404 for an unknown ID", async () => {
      const res = await request(app).get("/api/v1/certificates/verify/CERT-DOES-NOT-EXIST");

      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({ code: "NOT_FOUND", message: "certificate not found" });
    });
  });

  // ─── GET /api/v1/certificates ─────────────────────────────────────────────

  describe("GET /api/v1/certificates", () => {
    it("lists issued certificates newest first with paging meta", async () => {
      await issue({ ...issueBody, completionDate: "2024-01-10" });
      await issue({ ...issueBody, traineeId: "T2", trainingId: "TR2", completionDate: "2024-04-10" });

      const res = await request(app).get("/api/v1/certificates").set("X-Admin-Key", ADMIN_KEY);

      expect(res.status).toBe(200);
      expect(res.body.myData.certificates.map((c: { issueDate: string }) => c.issueDate)).toEqual([
        "2024-04-10",
        "2024-01-10",
      ]);
      expect(res.body.meta).toMatchObject({ count: 2, limit: 50, skip: 0 });
    });

    it("filters by training", async () => {
      await issue();
      await issue({ ...issueBody, trainingId: "TR2" });

      const res = await request(app)
        .get("/api/v1/certificates")
        .query({ trainingId: "TR2", limit: 5 })
        .set("X-Admin-Key", ADMIN_KEY);

      expect(res.status).toBe(200);
      expect(res.body.myData.certificates).toHaveLength(1);
      expect(res.body.myData.certificates[0].trainingTitle).toBe("Cold Chain Management");
      expect(res.body.meta).toMatchObject({ count: 1, limit: 5, skip: 0 });
    });

    it("filters by the trainee's region", async () => {
      await issue();
      await issue({ ...issueBody, traineeId: "T3" });

      const res = await request(app)
        .get("/api/v1/certificates")
        .query({ region: "Sidama" })
        .set("X-Admin-Key", ADMIN_KEY);

      expect(res.status).toBe(200);
      expect(res.body.myData.certificates.map((c: { traineeId: string }) => c.traineeId)).toEqual(["T3"]);
    });

    it("rejects a skip beyond the maximum", async () => {
      const res = await request(app).get("/api/v1/certificates?skip=999999999").set("X-Admin-Key", ADMIN_KEY);
      expect(res.status).toBe(422);
      expect(Object.keys(res.body.error.fields)).toEqual(["skip"]);
    });

    it("rejects an unknown order", async () => {
      const res = await request(app).get("/api/v1/certificates?order=sideways").set("X-Admin-Key", ADMIN_KEY);
      expect(res.status).toBe(422);
      expect(Object.keys(res.body.error.fields)).toEqual(["order"]);
    });
  });

  // ─── GET /api/v1/certificates/:certificateId/pdf ──────────────────────────

  describe("GET /api/v1/certificates/:certificateId/pdf", () => {
    it("reprints an issued certificate", async () => {
      const issued = await issue();
      const { certificateId } = issued.body.myData.certificate;

      const res = await request(app)
        .get(`/api/v1/certificates/${certificateId}/pdf`)
        .set("X-Admin-Key", ADMIN_KEY)
        .responseType("blob");

      expect(res.status).toBe(200);
      expect(res.headers["x-certificate-id"]).toBe(certificateId);
      expect(res.body.equals(Buffer.from(issued.body.myData.document.base64, "base64"))).toBe(true);
    });

    it("returns 404 for an unknown ID", async () => {
      const res = await request(app)
        .get("/api/v1/certificates/CERT-DOES-NOT-EXIST/pdf")
        .set("X-Admin-Key", ADMIN_KEY);
      expect(res.status).toBe(404);
    });
  });

  // ─── GET /api/v1/certificates/stats ───────────────────────────────────────

  describe("GET /api/v1/certificates/stats", () => {
    it("counts issued certificates by training type and region", async () => {
      await issue();
      await issue({ ...issueBody, traineeId: "T3", trainingId: "TR2" });
      await issue({ ...issueBody, traineeId: "T2" });

      const res = await request(app).get("/api/v1/certificates/stats").set("X-Admin-Key", ADMIN_KEY);

      expect(res.status).toBe(200);
      expect(res.body.message).toBe("certificate statistics");
      expect(res.body.myData).toEqual({
        period: "all",
        region: null,
        issuedFrom: null,
        issuedTo: null,
        totalCertificates: 3,
        byTrainingType: [
          { key: "EPI", count: 2 },
          { key: "Cold Chain", count: 1 },
        ],
        byRegion: [
          { key: "Oromia", count: 2 },
          { key: "Sidama", count: 1 },
        ],
      });
    });

    it("restricts the counts to a region", async () => {
      await issue();
      await issue({ ...issueBody, traineeId: "T3" });

      const res = await request(app)
        .get("/api/v1/certificates/stats")
        .query({ region: "Oromia" })
        .set("X-Admin-Key", ADMIN_KEY);

      expect(res.status).toBe(200);
      expect(res.body.myData.totalCertificates).toBe(1);
      expect(res.body.myData.byRegion).toEqual([{ key: "Oromia", count: 1 }]);
    });

    it("rejects an unknown period", async () => {
      const res = await request(app).get("/api/v1/certificates/stats?period=decade").set("X-Admin-Key", ADMIN_KEY);
      expect(res.status).toBe(422);
    });

    it("requires the admin key", async () => {
      const res = await request(app).get("/api/v1/certificates/stats");
      expect(res.status).toBe(401);
    });
  });

  it("answers unknown certificate paths with NOT_FOUND even without the admin key", async () => {
    const nested = await request(app).get("/api/v1/certificates/foo/bar");
    const verifyWithoutId = await request(app).get("/api/v1/certificates/verify");

    expect(nested.status).toBe(404);
    expect(nested.body.error.code).toBe("NOT_FOUND");
    expect(verifyWithoutId.status).toBe(404);
  });

  it("answers unknown routes with NOT_FOUND", async () => {
    const res = await request(app).get("/api/v1/nowhere");
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: "NOT_FOUND", message: "Route /api/v1/nowhere not found" });
    expect(res.body.meta.requestId).toBeTruthy();
  });
});
