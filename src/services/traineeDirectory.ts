import { TraineeModel, type TraineeAttrs } from "../models/trainee";
import { rethrowStoreError } from "../db/storeErrors";

export interface TraineeDisplay {
  traineeId: string;
  displayName: string;
  facility: string | null;
  region: string | null;
}

export interface TraineeDirectory {
  getTrainee(traineeId: string): Promise<TraineeDisplay | null>;
}

type TraineeNameParts = Pick<TraineeAttrs, "firstName" | "fathersName" | "grandFathersName" | "fullName">;

/**
 * Given name, father's name and grandfather's name joined by single spaces;
 * registry entries that only carry a full name fall back to it.
 */
export function traineeDisplayName(parts: Partial<TraineeNameParts>): string {
  const joined = [parts.firstName, parts.fathersName, parts.grandFathersName]
    .map((part) => (part ?? "").trim())
    .filter((part) => part.length > 0)
    .join(" ");
  if (joined.length > 0) return joined;
  return (parts.fullName ?? "").trim().replace(/\s+/g, " ");
}

export function toTraineeDisplay(doc: TraineeAttrs): TraineeDisplay {
  return {
    traineeId: doc.traineeId,
    displayName: traineeDisplayName(doc),
    facility: doc.facility ?? null,
    region: doc.region ?? null,
  };
}

export const mongoTraineeDirectory: TraineeDirectory = {
  async getTrainee(traineeId) {
    try {
      const doc = await TraineeModel.findOne({ traineeId }).lean<TraineeAttrs>().exec();
      return doc ? toTraineeDisplay(doc) : null;
    } catch (err) {
      return rethrowStoreError(err);
    }
  },
};
