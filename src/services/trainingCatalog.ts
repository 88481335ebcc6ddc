import { TrainingModel, type TrainingAttrs, type TrainingType } from "../models/training";
import { rethrowStoreError } from "../db/storeErrors";

export interface TrainingDisplay {
  trainingId: string;
  title: string;
  trainingType: TrainingType;
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD */
  endDate: string;
  venue: string | null;
  duration: string | null;
}

export interface TrainingCatalog {
  getTraining(trainingId: string): Promise<TrainingDisplay | null>;
}

export function toCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function toTrainingDisplay(doc: TrainingAttrs): TrainingDisplay {
  return {
    trainingId: doc.trainingId,
    title: doc.title,
    trainingType: doc.trainingType,
    startDate: toCalendarDate(doc.startDate),
    endDate: toCalendarDate(doc.endDate),
    venue: doc.venue ?? null,
    duration: doc.duration ?? null,
  };
}

export const mongoTrainingCatalog: TrainingCatalog = {
  async getTraining(trainingId) {
    try {
      const doc = await TrainingModel.findOne({ trainingId }).lean<TrainingAttrs>().exec();
      return doc ? toTrainingDisplay(doc) : null;
    } catch (err) {
      return rethrowStoreError(err);
    }
  },
};
