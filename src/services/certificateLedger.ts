import type { PipelineStage } from "mongoose";
import { CertificateModel, type CertificateAttrs } from "../models/certificate";
import { TRAINEE_COLLECTION, type TraineeAttrs } from "../models/trainee";
import { TRAINING_COLLECTION, type TrainingAttrs, type TrainingType } from "../models/training";
import { rethrowStoreError } from "../db/storeErrors";
import { traineeDisplayName } from "./traineeDirectory";

// ─── Types ─────────────────────────────────────────────────────────────────

export interface CertificateRecord {
  certificateId: string;
  traineeId: string;
  trainingId: string;
  /** YYYY-MM-DD */
  issueDate: string;
  venue: string;
  durationLabel: string;
  createdAt: Date;
}

export interface EnrichedCertificateRecord extends CertificateRecord {
  traineeName: string | null;
  trainingTitle: string | null;
  trainingType: TrainingType | null;
}

export type IssueDateOrder = "desc" | "asc";

export interface ListCertificatesQuery {
  order?: IssueDateOrder;
  traineeId?: string;
  trainingId?: string;
  /** Region of the trainee, as held by the trainee registry */
  region?: string;
  limit?: number;
  skip?: number;
}

/** Issue-date window, both ends inclusive, as YYYY-MM-DD. */
export interface CertificateStatsQuery {
  issuedFrom?: string;
  issuedTo?: string;
  region?: string;
}

export interface CertificateCount<K extends string> {
  key: K | null;
  count: number;
}

export interface CertificateStats {
  totalCertificates: number;
  byTrainingType: CertificateCount<TrainingType>[];
  byRegion: CertificateCount<string>[];
}

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;
export const MAX_LIST_SKIP = 10_000;

/**
 * Append-only store of issued certificates. `record` is a single atomic
 * insert guarded by the unique certificateId index; nothing is ever updated.
 */
export interface CertificateLedger {
  /** Throws DuplicateIdentifierError or StoreUnavailableError. */
  record(entry: CertificateRecord): Promise<CertificateRecord>;
  findById(certificateId: string): Promise<CertificateRecord | null>;
  listAll(query?: ListCertificatesQuery): Promise<EnrichedCertificateRecord[]>;
  /** Counts in the window, broken down by training type and trainee region. */
  stats(query?: CertificateStatsQuery): Promise<CertificateStats>;
}

// ─── Helpers ───────────────────────────────────────────────────────────────

export function toCertificateRecord(doc: CertificateAttrs): CertificateRecord {
  return {
    certificateId: doc.certificateId,
    traineeId: doc.traineeId,
    trainingId: doc.trainingId,
    issueDate: doc.issueDate,
    venue: doc.venue,
    durationLabel: doc.durationLabel,
    createdAt: new Date(doc.createdAt),
  };
}

export function clampListLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIST_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_LIST_LIMIT);
}

interface EnrichedRow extends CertificateAttrs {
  trainee?: Partial<TraineeAttrs> | null;
  training?: Pick<TrainingAttrs, "title" | "trainingType"> | null;
}

export function clampListSkip(skip: number | undefined): number {
  if (skip === undefined || !Number.isFinite(skip)) return 0;
  return Math.min(Math.max(Math.trunc(skip), 0), MAX_LIST_SKIP);
}

const lookupTrainee: PipelineStage.Lookup = {
  $lookup: {
    from: TRAINEE_COLLECTION,
    localField: "traineeId",
    foreignField: "traineeId",
    as: "trainee",
  },
};

const lookupTraining: PipelineStage.Lookup = {
  $lookup: {
    from: TRAINING_COLLECTION,
    localField: "trainingId",
    foreignField: "trainingId",
    as: "training",
  },
};

// The trainee join runs before paging only when the region filter needs it.
export function buildListPipeline(query: ListCertificatesQuery = {}): PipelineStage[] {
  const direction = query.order === "asc" ? 1 : -1;
  const match: Record<string, string> = {};
  if (query.traineeId) match.traineeId = query.traineeId;
  if (query.trainingId) match.trainingId = query.trainingId;

  const page: PipelineStage[] = [
    { $sort: { issueDate: direction, createdAt: direction, certificateId: direction } },
    { $skip: clampListSkip(query.skip) },
    { $limit: clampListLimit(query.limit) },
  ];
  const joinAndPage: PipelineStage[] = query.region
    ? [lookupTrainee, { $match: { "trainee.region": query.region } }, ...page]
    : [...page, lookupTrainee];

  return [
    { $match: match },
    ...joinAndPage,
    lookupTraining,
    {
      $project: {
        _id: 0,
        certificateId: 1,
        traineeId: 1,
        trainingId: 1,
        issueDate: 1,
        venue: 1,
        durationLabel: 1,
        createdAt: 1,
        trainee: { $arrayElemAt: ["$trainee", 0] },
        training: { $arrayElemAt: ["$training", 0] },
      },
    },
  ];
}

export function buildStatsPipeline(query: CertificateStatsQuery = {}): PipelineStage[] {
  const issueDate: Record<string, string> = {};
  if (query.issuedFrom) issueDate.$gte = query.issuedFrom;
  if (query.issuedTo) issueDate.$lte = query.issuedTo;

  const breakdown = (field: string): PipelineStage.FacetPipelineStage[] => [
    { $group: { _id: field, count: { $sum: 1 } } },
    { $sort: { count: -1, _id: 1 } },
  ];

  return [
    { $match: Object.keys(issueDate).length > 0 ? { issueDate } : {} },
    lookupTrainee,
    lookupTraining,
    {
      $project: {
        _id: 0,
        region: { $ifNull: [{ $arrayElemAt: ["$trainee.region", 0] }, null] },
        trainingType: { $ifNull: [{ $arrayElemAt: ["$training.trainingType", 0] }, null] },
      },
    },
    ...(query.region ? [{ $match: { region: query.region } }] : []),
    {
      $facet: {
        total: [{ $count: "count" }],
        byTrainingType: breakdown("$trainingType"),
        byRegion: breakdown("$region"),
      },
    },
  ];
}

interface StatsRow {
  total: { count: number }[];
  byTrainingType: { _id: TrainingType | null; count: number }[];
  byRegion: { _id: string | null; count: number }[];
}

function toStats(row: StatsRow | undefined): CertificateStats {
  return {
    totalCertificates: row?.total[0]?.count ?? 0,
    byTrainingType: (row?.byTrainingType ?? []).map(({ _id, count }) => ({ key: _id, count })),
    byRegion: (row?.byRegion ?? []).map(({ _id, count }) => ({ key: _id, count })),
  };
}

function toEnrichedRecord(row: EnrichedRow): EnrichedCertificateRecord {
  const traineeName = row.trainee ? traineeDisplayName(row.trainee) : "";
  return {
    ...toCertificateRecord(row),
    traineeName: traineeName.length > 0 ? traineeName : null,
    trainingTitle: row.training?.title ?? null,
    trainingType: row.training?.trainingType ?? null,
  };
}

// ─── MongoDB ledger ────────────────────────────────────────────────────────

export const mongoCertificateLedger: CertificateLedger = {
  async record(entry) {
    try {
      const doc = await CertificateModel.create(entry);
      return toCertificateRecord(doc);
    } catch (err) {
      return rethrowStoreError(err, entry.certificateId);
    }
  },

  async findById(certificateId) {
    try {
      const doc = await CertificateModel.findOne({ certificateId }).lean<CertificateAttrs>().exec();
      return doc ? toCertificateRecord(doc) : null;
    } catch (err) {
      return rethrowStoreError(err);
    }
  },

  async listAll(query = {}) {
    try {
      const rows = await CertificateModel.aggregate<EnrichedRow>(buildListPipeline(query)).exec();
      return rows.map(toEnrichedRecord);
    } catch (err) {
      return rethrowStoreError(err);
    }
  },

  async stats(query = {}) {
    try {
      const [row] = await CertificateModel.aggregate<StatsRow>(buildStatsPipeline(query)).exec();
      return toStats(row);
    } catch (err) {
      return rethrowStoreError(err);
    }
  },
};
