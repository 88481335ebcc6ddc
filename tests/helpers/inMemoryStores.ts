import { DuplicateIdentifierError, StoreUnavailableError } from "../../src/shared/errors";
import {
  clampListLimit,
  clampListSkip,
  type CertificateCount,
  type CertificateLedger,
  type CertificateRecord,
  type CertificateStats,
  type CertificateStatsQuery,
  type EnrichedCertificateRecord,
  type ListCertificatesQuery,
} from "../../src/services/certificateLedger";
import type { TraineeDirectory, TraineeDisplay } from "../../src/services/traineeDirectory";
import type { TrainingCatalog, TrainingDisplay } from "../../src/services/trainingCatalog";
import type { Clock } from "../../src/services/certificateIdService";

// ─── Collaborators ────────────────────────────────────────────────────────

export class InMemoryTraineeDirectory implements TraineeDirectory {
  readonly trainees = new Map<string, TraineeDisplay>();

  constructor(trainees: TraineeDisplay[] = []) {
    trainees.forEach((trainee) => this.trainees.set(trainee.traineeId, trainee));
  }

  async getTrainee(traineeId: string): Promise<TraineeDisplay | null> {
    return this.trainees.get(traineeId) ?? null;
  }
}

export class InMemoryTrainingCatalog implements TrainingCatalog {
  readonly trainings = new Map<string, TrainingDisplay>();

  constructor(trainings: TrainingDisplay[] = []) {
    trainings.forEach((training) => this.trainings.set(training.trainingId, training));
  }

  async getTraining(trainingId: string): Promise<TrainingDisplay | null> {
    return this.trainings.get(trainingId) ?? null;
  }
}

// ─── Ledger ───────────────────────────────────────────────────────────────

/**
 * Ledger backed by a Map. The existence check and the insert happen in one
 * synchronous step, matching the atomic insert of the unique index.
 */
export class InMemoryCertificateLedger implements CertificateLedger {
  private readonly records = new Map<string, CertificateRecord>();

  /** When set, every call fails as if the store could not be reached. */
  unavailable = false;

  constructor(
    private readonly trainees: InMemoryTraineeDirectory,
    private readonly trainings: InMemoryTrainingCatalog
  ) {}

  get size(): number {
    return this.records.size;
  }

  private ensureAvailable(): void {
    if (this.unavailable) throw new StoreUnavailableError();
  }

  async record(entry: CertificateRecord): Promise<CertificateRecord> {
    this.ensureAvailable();
    if (this.records.has(entry.certificateId)) {
      throw new DuplicateIdentifierError(entry.certificateId);
    }
    const stored = Object.freeze({ ...entry, createdAt: new Date(entry.createdAt) });
    this.records.set(entry.certificateId, stored);
    return { ...stored };
  }

  async findById(certificateId: string): Promise<CertificateRecord | null> {
    this.ensureAvailable();
    const stored = this.records.get(certificateId);
    return stored ? { ...stored } : null;
  }

  async listAll(query: ListCertificatesQuery = {}): Promise<EnrichedCertificateRecord[]> {
    this.ensureAvailable();
    const direction = query.order === "asc" ? 1 : -1;
    const skip = clampListSkip(query.skip);
    return [...this.records.values()]
      .filter((record) => !query.traineeId || record.traineeId === query.traineeId)
      .filter((record) => !query.trainingId || record.trainingId === query.trainingId)
      .filter((record) => !query.region || this.regionOf(record) === query.region)
      .sort((a, b) => {
        const byDate = a.issueDate.localeCompare(b.issueDate);
        if (byDate !== 0) return byDate * direction;
        return (a.createdAt.getTime() - b.createdAt.getTime()) * direction;
      })
      .slice(skip, skip + clampListLimit(query.limit))
      .map((record) => {
        const trainee = this.trainees.trainees.get(record.traineeId);
        const training = this.trainings.trainings.get(record.trainingId);
        return {
          ...record,
          traineeName: trainee?.displayName ?? null,
          trainingTitle: training?.title ?? null,
          trainingType: training?.trainingType ?? null,
        };
      });
  }

  async stats(query: CertificateStatsQuery = {}): Promise<CertificateStats> {
    this.ensureAvailable();
    const rows = [...this.records.values()]
      .filter((record) => !query.issuedFrom || record.issueDate >= query.issuedFrom)
      .filter((record) => !query.issuedTo || record.issueDate <= query.issuedTo)
      .map((record) => ({
        region: this.regionOf(record),
        trainingType: this.trainings.trainings.get(record.trainingId)?.trainingType ?? null,
      }))
      .filter((row) => !query.region || row.region === query.region);

    return {
      totalCertificates: rows.length,
      byTrainingType: countBy(rows.map((row) => row.trainingType)),
      byRegion: countBy(rows.map((row) => row.region)),
    };
  }

  private regionOf(record: CertificateRecord): string | null {
    return this.trainees.trainees.get(record.traineeId)?.region ?? null;
  }
}

/** Counts per key, largest first, ties by key. */
function countBy<K extends string>(keys: (K | null)[]): CertificateCount<K>[] {
  const counts = new Map<K | null, number>();
  keys.forEach((key) => counts.set(key, (counts.get(key) ?? 0) + 1));
  return [...counts.entries()]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || String(a.key).localeCompare(String(b.key)));
}

// ─── Clock ────────────────────────────────────────────────────────────────

/** Clock whose time advances one second per call and whose nonce is a counter. */
export function steppingClock(start = new Date("2024-03-01T08:00:00.000Z")): Clock {
  let tick = 0;
  let nonce = 0;
  return {
    now: () => new Date(start.getTime() + 1000 * tick++),
    randomBytes: (size) => {
      const bytes = Buffer.alloc(size);
      bytes.writeUInt32BE(nonce++, 0);
      return bytes;
    },
  };
}

// ─── Fixtures ─────────────────────────────────────────────────────────────

export const TRAINEE_T1: TraineeDisplay = {
  traineeId: "T1",
  displayName: "Almaz Bekele Tadesse",
  facility: "Adama Hospital",
  region: "Oromia",
};

export const TRAINEE_T2: TraineeDisplay = {
  traineeId: "T2",
  displayName: "Hana Girma Wolde",
  facility: "Bishoftu Health Center",
  region: "Oromia",
};

export const TRAINEE_T3: TraineeDisplay = {
  traineeId: "T3",
  displayName: "Selam Tesfaye Abebe",
  facility: null,
  region: "Sidama",
};

export const TRAINING_TR1: TrainingDisplay = {
  trainingId: "TR1",
  title: "Immunization in Practice",
  trainingType: "EPI",
  startDate: "2024-02-26",
  endDate: "2024-03-01",
  venue: "Adama Hospital",
  duration: "5 days",
};

export const TRAINING_TR2: TrainingDisplay = {
  trainingId: "TR2",
  title: "Cold Chain Management",
  trainingType: "Cold Chain",
  startDate: "2024-04-08",
  endDate: "2024-04-10",
  venue: "Hawassa",
  duration: "3 days",
};

export function createStores() {
  const trainees = new InMemoryTraineeDirectory([TRAINEE_T1, TRAINEE_T2, TRAINEE_T3]);
  const trainings = new InMemoryTrainingCatalog([TRAINING_TR1, TRAINING_TR2]);
  const ledger = new InMemoryCertificateLedger(trainees, trainings);
  return { trainees, trainings, ledger };
}
