import type { FilterQuery } from 'mongoose';
import { ExerciseModel, type ExerciseDoc } from '../models/Exercise.js';
import { ExerciseLogModel } from '../models/ExerciseLog.js';
import { CatalogUnavailableError } from '../lib/errors.js';
import type { Exercise, ExerciseFilters } from '../types.js';

export interface ExerciseCatalog {
  find(filters: ExerciseFilters, limit: number): Promise<Exercise[]>;
  /** Latest completion time per exercise for this user; missing ids were never logged. */
  recentlyUsed(userId: string, exerciseIds: string[]): Promise<Map<string, Date>>;
  markUsed(exerciseIds: string[], at: Date): Promise<void>;
}

export function toExercise(doc: ExerciseDoc): Exercise {
  return {
    exerciseId: doc.exerciseId,
    title: doc.title,
    description: doc.description ?? '',
    category: doc.category,
    bodyPart: doc.bodyPart,
    equipment: doc.equipment,
    level: doc.level,
    rating: doc.rating ?? 0,
    ratingDesc: doc.ratingDesc ?? '',
    metValue: doc.metValue,
    videoUrl: doc.videoUrl ?? null,
    videoDurationSeconds: doc.videoDurationSeconds ?? null,
    isActive: doc.isActive,
    usageCount: doc.usageCount ?? 0,
    lastUsedAt: doc.lastUsedAt ?? null,
  };
}

export function buildExerciseQuery(filters: ExerciseFilters): FilterQuery<ExerciseDoc> {
  const q: FilterQuery<ExerciseDoc> = { isActive: true };
  if (filters.bodyPart) q.bodyPart = filters.bodyPart;
  if (filters.equipment) q.equipment = filters.equipment;
  if (filters.level) q.level = filters.level;
  if (filters.category) q.category = filters.category;
  return q;
}

/**
 * Catalog backed by the `exercises` collection. Driver errors become
 * CatalogUnavailableError so the generator can fall back.
 */
export class MongoExerciseCatalog implements ExerciseCatalog {
  async find(filters: ExerciseFilters, limit: number): Promise<Exercise[]> {
    try {
      const docs = await ExerciseModel.find(buildExerciseQuery(filters))
        .sort({ rating: -1 })
        .limit(limit)
        .lean<ExerciseDoc[]>();
      return docs.map(toExercise);
    } catch (err) {
      throw new CatalogUnavailableError(err);
    }
  }

  async recentlyUsed(userId: string, exerciseIds: string[]): Promise<Map<string, Date>> {
    if (exerciseIds.length === 0) return new Map();

    const rows = await ExerciseLogModel.aggregate<{ _id: string; lastUsedAt: Date }>([
      { $match: { userId, exerciseId: { $in: exerciseIds } } },
      { $group: { _id: '$exerciseId', lastUsedAt: { $max: '$completedAt' } } },
    ]);

    return new Map(rows.map((r) => [r._id, r.lastUsedAt]));
  }

  async markUsed(exerciseIds: string[], at: Date): Promise<void> {
    if (exerciseIds.length === 0) return;
    await ExerciseModel.updateMany(
      { exerciseId: { $in: exerciseIds } },
      { $inc: { usageCount: 1 }, $set: { lastUsedAt: at } }
    );
  }
}
