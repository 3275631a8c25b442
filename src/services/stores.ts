import type { FilterQuery } from 'mongoose';
import { ExerciseLogModel, type ExerciseLogDoc } from '../models/ExerciseLog.js';
import { WorkoutModel, type WorkoutDoc } from '../models/Workout.js';
import { SystemConfigModel, type SystemConfigDoc } from '../models/SystemConfig.js';
import type {
  ExerciseLogEntry,
  NewExerciseLogEntry,
  StoredWorkout,
  TrainingConfig,
  WorkoutStatus,
} from '../types.js';

export type LogQuery = {
  workoutId?: string;
  since?: Date;
  skip?: number;
  limit?: number;
};

/** Aggregates over every entry of a user since a point in time. */
export type LogWindowStats = {
  totalCalories: number;
  exerciseCount: number;
  workoutCount: number;
  difficultySum: number;
  /** Most logged titles, count descending then title. */
  topExercises: Array<{ title: string; count: number }>;
};

export interface LogStore {
  append(entry: NewExerciseLogEntry): Promise<string>;
  /** Newest first. */
  query(userId: string, filters?: LogQuery): Promise<ExerciseLogEntry[]>;
  count(userId: string, filters?: Pick<LogQuery, 'workoutId' | 'since'>): Promise<number>;
  /** Oldest first. */
  forWorkout(workoutId: string): Promise<ExerciseLogEntry[]>;
  summarize(userId: string, since: Date, topLimit: number): Promise<LogWindowStats>;
}

export interface WorkoutStore {
  save(workout: StoredWorkout): Promise<void>;
  findById(workoutId: string): Promise<StoredWorkout | null>;
  /** Returns false when the workout does not exist. */
  setStatus(workoutId: string, status: WorkoutStatus): Promise<boolean>;
}

export interface SettingsStore {
  getTrainingConfig(): Promise<TrainingConfig>;
  updateTrainingConfig(patch: Partial<Omit<TrainingConfig, 'updatedAt'>>): Promise<TrainingConfig>;
}

// ============================================================================
// MongoDB
// ============================================================================

type LeanLog = ExerciseLogDoc & { _id: unknown };

function toLogEntry(doc: LeanLog): ExerciseLogEntry {
  return {
    logId: String(doc._id),
    userId: doc.userId,
    workoutId: doc.workoutId,
    exerciseId: doc.exerciseId,
    exerciseTitle: doc.exerciseTitle,
    phase: doc.phase,
    plannedSets: doc.plannedSets,
    completedSets: doc.completedSets,
    plannedReps: doc.plannedReps,
    actualReps: doc.actualReps ?? [],
    weightUsedKg: doc.weightUsedKg ?? 0,
    durationMinutes: doc.durationMinutes ?? 0,
    caloriesBurned: doc.caloriesBurned ?? 0,
    difficultyRating: doc.difficultyRating,
    notes: doc.notes ?? '',
    status: doc.status,
    completedAt: doc.completedAt,
  };
}

function logFilter(userId: string, filters: LogQuery = {}): FilterQuery<ExerciseLogDoc> {
  const q: FilterQuery<ExerciseLogDoc> = { userId };
  if (filters.workoutId) q.workoutId = filters.workoutId;
  if (filters.since) q.completedAt = { $gte: filters.since };
  return q;
}

export class MongoLogStore implements LogStore {
  async append(entry: NewExerciseLogEntry): Promise<string> {
    const doc = await ExerciseLogModel.create(entry);
    return String(doc._id);
  }

  async query(userId: string, filters: LogQuery = {}): Promise<ExerciseLogEntry[]> {
    let cursor = ExerciseLogModel.find(logFilter(userId, filters)).sort({ completedAt: -1 });
    if (filters.skip) cursor = cursor.skip(filters.skip);
    if (filters.limit) cursor = cursor.limit(filters.limit);
    const docs = await cursor.lean<LeanLog[]>();
    return docs.map(toLogEntry);
  }

  count(userId: string, filters: Pick<LogQuery, 'workoutId' | 'since'> = {}): Promise<number> {
    return ExerciseLogModel.countDocuments(logFilter(userId, filters)).exec();
  }

  async forWorkout(workoutId: string): Promise<ExerciseLogEntry[]> {
    const docs = await ExerciseLogModel.find({ workoutId }).sort({ completedAt: 1 }).lean<LeanLog[]>();
    return docs.map(toLogEntry);
  }

  async summarize(userId: string, since: Date, topLimit: number): Promise<LogWindowStats> {
    const match = { $match: logFilter(userId, { since }) };
    const [totals, top] = await Promise.all([
      ExerciseLogModel.aggregate<{ calories: number; exercises: number; workouts: string[]; difficulty: number }>([
        match,
        {
          $group: {
            _id: null,
            calories: { $sum: '$caloriesBurned' },
            exercises: { $sum: 1 },
            workouts: { $addToSet: '$workoutId' },
            difficulty: { $sum: '$difficultyRating' },
          },
        },
      ]),
      ExerciseLogModel.aggregate<{ _id: string; count: number }>([
        match,
        { $group: { _id: '$exerciseTitle', count: { $sum: 1 } } },
        { $sort: { count: -1, _id: 1 } },
        { $limit: topLimit },
      ]),
    ]);

    const row = totals[0];
    return {
      totalCalories: row?.calories ?? 0,
      exerciseCount: row?.exercises ?? 0,
      workoutCount: row?.workouts.length ?? 0,
      difficultySum: row?.difficulty ?? 0,
      topExercises: top.map((r) => ({ title: r._id, count: r.count })),
    };
  }
}

export class MongoWorkoutStore implements WorkoutStore {
  async save(workout: StoredWorkout): Promise<void> {
    await WorkoutModel.create(workout);
  }

  async findById(workoutId: string): Promise<StoredWorkout | null> {
    const doc = await WorkoutModel.findOne({ workoutId }, { _id: 0, __v: 0, updatedAt: 0 }).lean<WorkoutDoc | null>();
    return doc;
  }

  async setStatus(workoutId: string, status: WorkoutStatus): Promise<boolean> {
    const result = await WorkoutModel.updateOne({ workoutId }, { $set: { status } });
    return result.matchedCount > 0;
  }
}

function toTrainingConfig(doc: SystemConfigDoc): TrainingConfig {
  return {
    trainingWindowDays: doc.trainingWindowDays,
    minSessionsForTraining: doc.minSessionsForTraining,
    updatedAt: doc.updatedAt,
  };
}

/**
 * Training configuration lives in a single `ml_training` document that is
 * created from the defaults on first read.
 */
export class MongoSettingsStore implements SettingsStore {
  constructor(private readonly defaults: TrainingConfig) {}

  async getTrainingConfig(): Promise<TrainingConfig> {
    const doc = await SystemConfigModel.findOneAndUpdate(
      { configType: 'ml_training' },
      {
        $setOnInsert: {
          configType: 'ml_training',
          trainingWindowDays: this.defaults.trainingWindowDays,
          minSessionsForTraining: this.defaults.minSessionsForTraining,
        },
      },
      { upsert: true, new: true }
    ).lean<SystemConfigDoc | null>();

    if (!doc) throw new Error('Training config could not be created');
    return toTrainingConfig(doc);
  }

  async updateTrainingConfig(patch: Partial<Omit<TrainingConfig, 'updatedAt'>>): Promise<TrainingConfig> {
    await this.getTrainingConfig();
    const doc = await SystemConfigModel.findOneAndUpdate(
      { configType: 'ml_training' },
      { $set: patch },
      { new: true, runValidators: true }
    ).lean<SystemConfigDoc | null>();

    return doc ? toTrainingConfig(doc) : this.getTrainingConfig();
  }
}
