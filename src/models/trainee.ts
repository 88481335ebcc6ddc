import { Document, Model, Schema, model, models } from "mongoose";

// Owned by the trainee registry; this service only reads it.
export const TRAINEE_COLLECTION = "trainees";

export interface TraineeAttrs {
  traineeId: string;
  firstName: string | null;
  fathersName: string | null;
  grandFathersName: string | null;
  fullName: string | null;
  facility: string | null;
  region: string | null;
}

export interface TraineeDocument extends TraineeAttrs, Document {}

const TraineeSchema = new Schema<TraineeDocument>(
  {
    traineeId: { type: String, required: true },
    firstName: { type: String, default: null },
    fathersName: { type: String, default: null },
    grandFathersName: { type: String, default: null },
    fullName: { type: String, default: null },
    facility: { type: String, default: null },
    region: { type: String, default: null },
  },
  { collection: TRAINEE_COLLECTION, timestamps: true }
);

TraineeSchema.index({ traineeId: 1 }, { unique: true });

export const TraineeModel =
  (models.Trainee as Model<TraineeDocument>) ||
  model<TraineeDocument>("Trainee", TraineeSchema);
