import mongoose, { Schema } from 'mongoose';
import { FITNESS_LEVELS, PHASES, type StoredWorkout } from '../types.js';

export type WorkoutDoc = StoredWorkout & {
  updatedAt: Date;
};

const ExerciseRefSchema = new Schema(
  {
    exerciseId: { type: String, required: true },
    title: { type: String, required: true },
    description: { type: String, default: '' },
    category: { type: String, required: true },
    bodyPart: { type: String, default: '' },
    equipment: { type: String, default: '' },
    level: { type: String, enum: [...FITNESS_LEVELS], required: true },
    videoUrl: { type: String, default: null },
  },
  { _id: false }
);

const PlannedExerciseSchema = new Schema(
  {
    exercise: { type: ExerciseRefSchema, required: true },
    phase: { type: String, enum: [...PHASES], required: true },
    order: { type: Number, required: true },
    sets: { type: Number, required: true },
    reps: { type: Number, required: true },
    restSeconds: { type: Number, required: true },
    holdSeconds: { type: Number },
    durationMinutes: { type: Number, required: true },
    metValue: { type: Number, required: true },
    estimatedCalories: { type: Number, required: true },
    notes: { type: String, default: '' },
    source: { type: String, enum: ['catalog', 'emergency'], required: true },
    fallbackLevel: { type: String, required: true },
  },
  { _id: false }
);

const PhaseSummarySchema = new Schema(
  {
    durationMinutes: { type: Number, required: true },
    calories: { type: Number, required: true },
    exerciseCount: { type: Number, required: true },
  },
  { _id: false }
);

const WorkoutSchema = new Schema<WorkoutDoc>(
  {
    workoutId: { type: String, required: true, unique: true, index: true },
    userId: { type: String, index: true },
    fitnessLevel: { type: String, enum: [...FITNESS_LEVELS], required: true },
    weightKg: { type: Number, required: true },
    targetBodyParts: { type: [String], default: [] },
    phases: {
      warmup: { type: [PlannedExerciseSchema], default: [] },
      main: { type: [PlannedExerciseSchema], default: [] },
      stretch: { type: [PlannedExerciseSchema], default: [] },
    },
    summaries: {
      warmup: { type: PhaseSummarySchema, required: true },
      main: { type: PhaseSummarySchema, required: true },
      stretch: { type: PhaseSummarySchema, required: true },
    },
    totalDurationMinutes: { type: Number, required: true },
    totalCalories: { type: Number, required: true },
    status: { type: String, enum: ['generated', 'in_progress', 'completed'], default: 'generated' },
    createdAt: { type: Date, required: true },
  },
  { timestamps: { createdAt: false, updatedAt: true } }
);

WorkoutSchema.index({ userId: 1, createdAt: -1 });

export const WorkoutModel = mongoose.model<WorkoutDoc>('Workout', WorkoutSchema);
