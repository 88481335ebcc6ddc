import {
  CertificateError,
  DuplicateIdentifierError,
  IncompleteRequestError,
  IssuanceFailedError,
  ReferenceNotFoundError,
  RenderingFailedError,
  isCertificateError,
} from "../shared/errors";
import { fail, ok, type Result } from "../shared/result";
import { logger } from "../shared/logger";
import { generateCertificateId, systemClock, type Clock } from "./certificateIdService";
import type { CertificateRenderInput, CertificateRenderer, RenderedCertificate } from "./certificateRenderer";
import type {
  CertificateLedger,
  CertificateRecord,
  CertificateStats,
  CertificateStatsQuery,
  EnrichedCertificateRecord,
  ListCertificatesQuery,
} from "./certificateLedger";
import type { TraineeDirectory, TraineeDisplay } from "./traineeDirectory";
import type { TrainingCatalog, TrainingDisplay } from "./trainingCatalog";

// ─── Types ─────────────────────────────────────────────────────────────────

export interface IssueCertificateRequest {
  traineeId: string;
  trainingId: string;
  /** YYYY-MM-DD; becomes the certificate's issue date */
  completionDate: string;
  /** Falls back to the trainee's facility, then the training's venue. */
  venue?: string;
  durationLabel: string;
}

export interface IssuedCertificate extends RenderedCertificate {
  certificate: CertificateRecord;
}

export type IssuanceStage =
  | "requested"
  | "identifier_allocated"
  | "rendered"
  | "recorded"
  | "completed"
  | "failed";

export const STATS_PERIODS = ["all", "today", "week", "month", "year"] as const;
export type StatsPeriod = (typeof STATS_PERIODS)[number];

export interface CertificateStatsRequest {
  period?: StatsPeriod;
  region?: string;
}

export interface CertificateStatsReport extends CertificateStats {
  period: StatsPeriod;
  region: string | null;
  issuedFrom: string | null;
  issuedTo: string | null;
}

export interface CertificateIssuanceDeps {
  ledger: CertificateLedger;
  trainees: TraineeDirectory;
  trainings: TrainingCatalog;
  render: CertificateRenderer;
  clock?: Clock;
  generateId?: (traineeId: string, trainingId: string, clock: Clock) => string;
  /** Identifier allocations per request before giving up on collisions. */
  maxIdAttempts?: number;
}

export interface CertificateIssuanceService {
  issue(request: IssueCertificateRequest): Promise<Result<IssuedCertificate>>;
  /** `null` when no certificate carries this ID. */
  verify(certificateId: string): Promise<Result<EnrichedCertificateRecord | null>>;
  list(query?: ListCertificatesQuery): Promise<Result<EnrichedCertificateRecord[]>>;
  /** Regenerates the PDF of an issued certificate; `null` when it does not exist. */
  renderIssued(certificateId: string): Promise<Result<RenderedCertificate | null>>;
  stats(request?: CertificateStatsRequest): Promise<Result<CertificateStatsReport>>;
}

export const DEFAULT_MAX_ID_ATTEMPTS = 3;

// ─── Helpers ───────────────────────────────────────────────────────────────

function asCertificateError(err: unknown, message: string, stage?: IssuanceStage): CertificateError {
  if (isCertificateError(err)) return err;
  return new IssuanceFailedError(message, { cause: err, stage });
}

const PERIOD_DAYS: Record<Exclude<StatsPeriod, "all" | "today">, number> = {
  week: 7,
  month: 30,
  year: 365,
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Issue-date window for a reporting period, in UTC calendar days. "today"
 * is the current day only; the rolling periods reach back N days from today.
 */
export function statsWindow(period: StatsPeriod, now: Date): Pick<CertificateStatsQuery, "issuedFrom" | "issuedTo"> {
  const today = now.toISOString().slice(0, 10);
  if (period === "all") return {};
  if (period === "today") return { issuedFrom: today, issuedTo: today };
  const from = new Date(Date.parse(`${today}T00:00:00.000Z`) - PERIOD_DAYS[period] * DAY_MS);
  return { issuedFrom: from.toISOString().slice(0, 10) };
}

function firstPresent(...values: (string | null | undefined)[]): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

function enrich(
  record: CertificateRecord,
  trainee: TraineeDisplay | null,
  training: TrainingDisplay | null
): EnrichedCertificateRecord {
  return {
    ...record,
    traineeName: trainee?.displayName ?? null,
    trainingTitle: training?.title ?? null,
    trainingType: training?.trainingType ?? null,
  };
}

// ─── Service ───────────────────────────────────────────────────────────────

/**
 * Coordinates identifier allocation, rendering and recording. Holds no state
 * between calls; concurrent issuance relies on the ledger's unique index.
 */
export function createCertificateIssuanceService(deps: CertificateIssuanceDeps): CertificateIssuanceService {
  const clock = deps.clock ?? systemClock;
  const generateId = deps.generateId ?? generateCertificateId;
  const maxIdAttempts = Math.max(1, deps.maxIdAttempts ?? DEFAULT_MAX_ID_ATTEMPTS);

  async function lookupReferences(traineeId: string, trainingId: string) {
    const [trainee, training] = await Promise.all([
      deps.trainees.getTrainee(traineeId),
      deps.trainings.getTraining(trainingId),
    ]);
    return { trainee, training };
  }

  async function issue(request: IssueCertificateRequest): Promise<Result<IssuedCertificate>> {
    const log = logger.child({ traineeId: request.traineeId, trainingId: request.trainingId });
    let stage: IssuanceStage = "requested";

    const advance = (next: IssuanceStage, extra: Record<string, unknown> = {}) => {
      stage = next;
      log.debug({ msg: "Certificate issuance stage", stage, ...extra });
    };

    const failed = (error: CertificateError): Result<never> => {
      const failedAt = stage;
      stage = "failed";
      const entry = { msg: "Certificate issuance failed", stage: failedAt, code: error.code, err: error };
      if (error.status >= 500 && !error.retryable) log.error(entry);
      else log.warn(entry);
      return fail(error);
    };

    advance("requested");

    // Display data is fetched once so the document and the record describe the same moment.
    let trainee: TraineeDisplay | null;
    let training: TrainingDisplay | null;
    try {
      ({ trainee, training } = await lookupReferences(request.traineeId, request.trainingId));
    } catch (err) {
      return failed(asCertificateError(err, "certificate issuance failed", stage));
    }
    if (!trainee) return failed(new ReferenceNotFoundError("trainee", request.traineeId));
    if (!training) return failed(new ReferenceNotFoundError("training", request.trainingId));

    const venue = firstPresent(request.venue, trainee.facility, training.venue);
    if (!venue) return failed(new IncompleteRequestError("venue"));

    for (let attempt = 1; attempt <= maxIdAttempts; attempt += 1) {
      let certificateId: string;
      try {
        certificateId = generateId(request.traineeId, request.trainingId, clock);
      } catch (err) {
        return failed(
          new IssuanceFailedError("could not allocate a certificate identifier", { cause: err, stage })
        );
      }
      advance("identifier_allocated", { certificateId, attempt });

      const renderInput: CertificateRenderInput = {
        certificateId,
        traineeName: trainee.displayName,
        trainingTitle: training.title,
        completionDate: request.completionDate,
        venue,
        durationLabel: request.durationLabel,
      };

      let rendered: RenderedCertificate;
      try {
        rendered = await deps.render(renderInput);
      } catch (err) {
        return failed(
          isCertificateError(err) ? err : new RenderingFailedError("certificate rendering failed", { cause: err })
        );
      }
      advance("rendered", { certificateId, verificationCodeEmbedded: rendered.verificationCodeEmbedded });

      let certificate: CertificateRecord;
      try {
        certificate = await deps.ledger.record({
          certificateId,
          traineeId: request.traineeId,
          trainingId: request.trainingId,
          issueDate: request.completionDate,
          venue,
          durationLabel: request.durationLabel,
          createdAt: clock.now(),
        });
      } catch (err) {
        if (err instanceof DuplicateIdentifierError) {
          log.warn({ msg: "Certificate identifier collision", certificateId, attempt });
          continue;
        }
        return failed(asCertificateError(err, "certificate issuance failed", stage));
      }
      advance("recorded", { certificateId });

      advance("completed", { certificateId });
      log.info({ msg: "Certificate issued", certificateId, issueDate: certificate.issueDate });
      return ok({ certificate, ...rendered });
    }

    return failed(
      new IssuanceFailedError(`no unique certificate identifier after ${maxIdAttempts} attempts`, { stage })
    );
  }

  async function verify(certificateId: string): Promise<Result<EnrichedCertificateRecord | null>> {
    try {
      const record = await deps.ledger.findById(certificateId);
      if (!record) {
        logger.info({ msg: "Certificate not found", certificateId });
        return ok(null);
      }
      const { trainee, training } = await lookupReferences(record.traineeId, record.trainingId);
      return ok(enrich(record, trainee, training));
    } catch (err) {
      const error = asCertificateError(err, "certificate verification failed");
      logger.warn({ msg: "Certificate verification failed", certificateId, code: error.code, err: error });
      return fail(error);
    }
  }

  async function list(query: ListCertificatesQuery = {}): Promise<Result<EnrichedCertificateRecord[]>> {
    try {
      return ok(await deps.ledger.listAll(query));
    } catch (err) {
      const error = asCertificateError(err, "certificate listing failed");
      logger.warn({ msg: "Certificate listing failed", code: error.code, err: error });
      return fail(error);
    }
  }

  async function renderIssued(certificateId: string): Promise<Result<RenderedCertificate | null>> {
    try {
      const record = await deps.ledger.findById(certificateId);
      if (!record) return ok(null);

      const { trainee, training } = await lookupReferences(record.traineeId, record.trainingId);
      if (!trainee) return fail(new ReferenceNotFoundError("trainee", record.traineeId));
      if (!training) return fail(new ReferenceNotFoundError("training", record.trainingId));

      return ok(
        await deps.render({
          certificateId: record.certificateId,
          traineeName: trainee.displayName,
          trainingTitle: training.title,
          completionDate: record.issueDate,
          venue: record.venue,
          durationLabel: record.durationLabel,
        })
      );
    } catch (err) {
      const error = isCertificateError(err)
        ? err
        : new RenderingFailedError("certificate rendering failed", { cause: err });
      logger.warn({ msg: "Certificate reprint failed", certificateId, code: error.code, err: error });
      return fail(error);
    }
  }

  async function stats(request: CertificateStatsRequest = {}): Promise<Result<CertificateStatsReport>> {
    const period = request.period ?? "all";
    const window = statsWindow(period, clock.now());
    try {
      const counts = await deps.ledger.stats({ ...window, region: request.region });
      return ok({
        period,
        region: request.region ?? null,
        issuedFrom: window.issuedFrom ?? null,
        issuedTo: window.issuedTo ?? null,
        ...counts,
      });
    } catch (err) {
      const error = asCertificateError(err, "certificate statistics failed");
      logger.warn({ msg: "Certificate statistics failed", period, code: error.code, err: error });
      return fail(error);
    }
  }

  return { issue, verify, list, renderIssued, stats };
}
