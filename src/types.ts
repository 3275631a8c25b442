export const FITNESS_LEVELS = ['Beginner', 'Intermediate', 'Expert'] as const;
export type FitnessLevel = (typeof FITNESS_LEVELS)[number];

export const PHASES = ['warmup', 'main', 'stretch'] as const;
export type Phase = (typeof PHASES)[number];

export type ExerciseCategory = string;

export type Exercise = {
  exerciseId: string;
  title: string;
  description: string;
  category: ExerciseCategory;
  bodyPart: string;
  equipment: string;
  level: FitnessLevel;
  rating: number;
  ratingDesc?: string;
  metValue: number;
  videoUrl?: string | null;
  videoDurationSeconds?: number | null;
  isActive: boolean;
  usageCount: number;
  lastUsedAt?: Date | null;
};

export type ExerciseFilters = {
  bodyPart?: string;
  equipment?: string;
  level?: FitnessLevel;
  category?: ExerciseCategory;
};

export type WorkoutRequest = {
  userId?: string;
  targetBodyParts: string[];
  durationMinutes: number;
  weightKg: number;
  fitnessLevel: FitnessLevel;
  includeWarmup?: boolean;
  includeStretches?: boolean;
  /** Categories for the main phase. Defaults to Strength. */
  categories?: ExerciseCategory[];
  seed?: number;
};

export type ExerciseRef = Pick<
  Exercise,
  'exerciseId' | 'title' | 'description' | 'category' | 'bodyPart' | 'equipment' | 'level'
> & { videoUrl: string | null };

export type CascadeLevel =
  | 'exact'
  | 'any-level'
  | 'any-body-part'
  | 'any-body-part-any-level'
  | 'phase-purpose'
  | 'emergency';

export type PlannedExercise = {
  exercise: ExerciseRef;
  phase: Phase;
  order: number;
  sets: number;
  reps: number;
  restSeconds: number;
  holdSeconds?: number;
  durationMinutes: number;
  metValue: number;
  estimatedCalories: number;
  notes: string;
  source: 'catalog' | 'emergency';
  fallbackLevel: CascadeLevel;
};

export type PhaseSummary = {
  durationMinutes: number;
  calories: number;
  exerciseCount: number;
};

export type GeneratedWorkout = {
  workoutId: string;
  userId?: string;
  fitnessLevel: FitnessLevel;
  weightKg: number;
  targetBodyParts: string[];
  phases: Record<Phase, PlannedExercise[]>;
  summaries: Record<Phase, PhaseSummary>;
  totalDurationMinutes: number;
  totalCalories: number;
  createdAt: Date;
};

export type WorkoutStatus = 'generated' | 'in_progress' | 'completed';
export type LogStatus = 'in_progress' | 'completed';

export type StoredWorkout = GeneratedWorkout & { status: WorkoutStatus };

export type ExerciseLogEntry = {
  logId: string;
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
};

export type NewExerciseLogEntry = Omit<ExerciseLogEntry, 'logId'>;

export type TrainingConfig = {
  trainingWindowDays: number;
  minSessionsForTraining: number;
  updatedAt?: Date;
};

export function parseFitnessLevel(value: unknown): FitnessLevel | null {
  if (typeof value !== 'string') return null;
  const needle = value.trim().toLowerCase();
  return FITNESS_LEVELS.find((level) => level.toLowerCase() === needle) ?? null;
}
