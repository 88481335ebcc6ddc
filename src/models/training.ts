import { Document, Model, Schema, model, models } from "mongoose";

// Owned by the training catalog; this service only reads it.
export const TRAINING_COLLECTION = "trainings";

export const TRAINING_TYPES = ["EPI", "Cold Chain", "Data", "Clinical", "Community", "Other"] as const;
export type TrainingType = (typeof TRAINING_TYPES)[number];

export interface TrainingAttrs {
  trainingId: string;
  title: string;
  trainingType: TrainingType;
  startDate: Date;
  endDate: Date;
  venue: string | null;
  duration: string | null;
}

export interface TrainingDocument extends TrainingAttrs, Document {}

const TrainingSchema = new Schema<TrainingDocument>(
  {
    trainingId: { type: String, required: true },
    title: { type: String, required: true, maxlength: 200 },
    trainingType: { type: String, enum: [...TRAINING_TYPES], required: true },
    startDate: { type: Date, required: true },
    endDate: { type: Date, required: true },
    venue: { type: String, default: null },
    duration: { type: String, default: null },
  },
  { collection: TRAINING_COLLECTION, timestamps: true }
);

TrainingSchema.index({ trainingId: 1 }, { unique: true });

export const TrainingModel =
  (models.Training as Model<TrainingDocument>) ||
  model<TrainingDocument>("Training", TrainingSchema);
