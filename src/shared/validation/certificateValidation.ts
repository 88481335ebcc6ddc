import { z } from "zod";
import { MAX_LIST_LIMIT, MAX_LIST_SKIP } from "../../services/certificateLedger";
import { STATS_PERIODS } from "../../services/certificateIssuanceService";

export function isCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

const referenceId = (label: string) =>
  z.string().trim().min(1, `${label} is required`).max(100, `${label} must be at most 100 characters`);

// ─── Issue certificate ─────────────────────────────────────────────────────

export const issueCertificateSchema = z.object({
  traineeId: referenceId("traineeId"),
  trainingId: referenceId("trainingId"),
  completionDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "completionDate must be YYYY-MM-DD")
    .refine(isCalendarDate, "completionDate is not a valid calendar date"),
  // Omitted venues default to the trainee's facility
  venue: z
    .string()
    .trim()
    .min(1, "Venue must not be blank")
    .max(200, "Venue must be at most 200 characters")
    .optional(),
  durationLabel: z
    .string()
    .trim()
    .min(1, "Duration is required")
    .max(100, "Duration must be at most 100 characters"),
});

// ─── Certificate ID param ──────────────────────────────────────────────────

export const certificateIdParamSchema = z.object({
  certificateId: z.string().trim().min(1, "certificateId is required").max(100),
});

// ─── List certificates ─────────────────────────────────────────────────────

export const listCertificatesSchema = z.object({
  order: z.enum(["desc", "asc"]).default("desc"),
  traineeId: referenceId("traineeId").optional(),
  trainingId: referenceId("trainingId").optional(),
  region: z.string().trim().min(1).max(100).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(50),
  skip: z.coerce.number().int().min(0).max(MAX_LIST_SKIP).default(0),
});

// ─── Certificate statistics ────────────────────────────────────────────────

export const certificateStatsSchema = z.object({
  period: z.enum(STATS_PERIODS).default("all"),
  region: z.string().trim().min(1).max(100).optional(),
});
