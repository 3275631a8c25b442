import mongoose, { Schema } from 'mongoose';
import { PHASES, type LogStatus, type Phase } from '../types.js';

export type ExerciseLogDoc = {
  userId: string;
  workoutId: string;
  exerciseId: string;
  exerciseTitle: string;
  phase: Phase;
  plannedSets: number;
  completedSets: number;
  plannedReps: number;
  actualReps: number[];
  weightUsedKg: number;
  durationMinutes: number;
  caloriesBurned: number;
  difficultyRating: number;
  notes: string;
  status: LogStatus;
  completedAt: Date;
  createdAt: Date;
  updatedAt: Date;
};

const ExerciseLogSchema = new Schema<ExerciseLogDoc>(
  {
    userId: { type: String, required: true, index: true },
    workoutId: { type: String, required: true, index: true },
    exerciseId: { type: String, required: true, index: true },
    exerciseTitle: { type: String, required: true },
    phase: { type: String, enum: [...PHASES], required: true },
    plannedSets: { type: Number, required: true },
    completedSets: { type: Number, required: true },
    plannedReps: { type: Number, required: true },
    actualReps: { type: [Number], default: [] },
    weightUsedKg: { type: Number, default: 0 },
    durationMinutes: { type: Number, default: 0 },
    caloriesBurned: { type: Number, default: 0 },
    difficultyRating: { type: Number, min: 1, max: 10, default: 5 },
    notes: { type: String, default: '' },
    status: { type: String, enum: ['in_progress', 'completed'], default: 'in_progress' },
    completedAt: { type: Date, required: true },
  },
  { timestamps: true }
);

ExerciseLogSchema.index({ userId: 1, completedAt: -1 });
ExerciseLogSchema.index({ workoutId: 1, completedAt: 1 });

export const ExerciseLogModel = mongoose.model<ExerciseLogDoc>('ExerciseLog', ExerciseLogSchema);
