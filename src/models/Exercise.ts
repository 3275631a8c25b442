import mongoose, { Schema } from 'mongoose';
import { FITNESS_LEVELS, type FitnessLevel } from '../types.js';

export type ExerciseDoc = {
  exerciseId: string;
  title: string;
  description?: string;
  category: string;
  bodyPart: string;
  equipment: string;
  level: FitnessLevel;
  rating?: number;
  ratingDesc?: string;
  metValue: number;
  videoUrl?: string | null;
  videoDurationSeconds?: number | null;
  isActive: boolean;
  usageCount?: number;
  lastUsedAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

const ExerciseSchema = new Schema<ExerciseDoc>(
  {
    exerciseId: { type: String, required: true, unique: true, index: true },
    title: { type: String, required: true },
    description: { type: String, default: '' },
    category: { type: String, required: true, index: true },
    bodyPart: { type: String, required: true, index: true },
    equipment: { type: String, default: '', index: true },
    level: { type: String, enum: [...FITNESS_LEVELS], required: true, index: true },
    rating: { type: Number, default: 0 },
    ratingDesc: { type: String, default: '' },
    metValue: { type: Number, required: true },
    videoUrl: { type: String, default: null },
    videoDurationSeconds: { type: Number, default: null },
    isActive: { type: Boolean, default: true },
    usageCount: { type: Number, default: 0 },
    lastUsedAt: { type: Date, default: null },
  },
  { timestamps: true }
);

ExerciseSchema.index({ bodyPart: 1, level: 1, category: 1 });

export const ExerciseModel = mongoose.model<ExerciseDoc>('Exercise', ExerciseSchema);
