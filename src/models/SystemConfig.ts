import mongoose, { Schema } from 'mongoose';

export type SystemConfigDoc = {
  configType: 'ml_training';
  trainingWindowDays: number;
  minSessionsForTraining: number;
  createdAt: Date;
  updatedAt: Date;
};

const SystemConfigSchema = new Schema<SystemConfigDoc>(
  {
    configType: { type: String, enum: ['ml_training'], required: true, unique: true },
    trainingWindowDays: { type: Number, required: true, min: 7, max: 90 },
    minSessionsForTraining: { type: Number, required: true, min: 1, max: 100 },
  },
  { timestamps: true }
);

export const SystemConfigModel = mongoose.model<SystemConfigDoc>('SystemConfig', SystemConfigSchema);
