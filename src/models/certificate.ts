import { Document, Model, Schema, model, models } from "mongoose";

export const CERTIFICATE_COLLECTION = "certificates";

// ─── Document interface ────────────────────────────────────────────────────

export interface CertificateAttrs {
  certificateId: string;
  traineeId: string;
  trainingId: string;
  /** Calendar date, YYYY-MM-DD */
  issueDate: string;
  venue: string;
  durationLabel: string;
  createdAt: Date;
}

export interface CertificateDocument extends CertificateAttrs, Document {}

// ─── Main schema ───────────────────────────────────────────────────────────

// Records are written once and never updated; corrections are new issuances.
const CertificateSchema = new Schema<CertificateDocument>(
  {
    certificateId: { type: String, required: true, immutable: true },
    traineeId: { type: String, required: true, immutable: true },
    trainingId: { type: String, required: true, immutable: true },
    issueDate: {
      type: String,
      required: true,
      immutable: true,
      match: /^\d{4}-\d{2}-\d{2}$/,
    },
    venue: { type: String, required: true, immutable: true, maxlength: 200 },
    durationLabel: { type: String, required: true, immutable: true, maxlength: 100 },
    createdAt: { type: Date, required: true, immutable: true },
  },
  { collection: CERTIFICATE_COLLECTION, versionKey: false }
);

// ─── Indexes ───────────────────────────────────────────────────────────────

CertificateSchema.index({ certificateId: 1 }, { unique: true });
CertificateSchema.index({ issueDate: -1, createdAt: -1 });
CertificateSchema.index({ traineeId: 1, trainingId: 1 });
CertificateSchema.index({ trainingId: 1, issueDate: -1 });

// ─── Export ────────────────────────────────────────────────────────────────

export const CertificateModel =
  (models.Certificate as Model<CertificateDocument>) ||
  model<CertificateDocument>("Certificate", CertificateSchema);
