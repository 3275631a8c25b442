import crypto from 'node:crypto';
import { parse } from 'csv-parse/sync';
import { ExerciseModel } from '../models/Exercise.js';
import { metValueFor } from '../services/calories.js';
import { parseFitnessLevel, type Exercise } from '../types.js';

/**
 * Column names of the exercise dataset CSV:
 * Title, Desc, Type, BodyPart, Equipment, Level, Rating, RatingDesc
 */
type DatasetRow = Record<string, string | undefined>;

export type ParsedDataset = {
  total: number;
  exercises: Exercise[];
  skipped: number;
};

export type DatasetLoadResult = {
  total: number;
  loaded: number;
  skipped: number;
};

/** Stable id derived from the title, so reloading the CSV updates rather than duplicates. */
export function exerciseIdForTitle(title: string): string {
  return `ex_${crypto.createHash('md5').update(title).digest('hex').slice(0, 8)}`;
}

function text(row: DatasetRow, column: string) {
  return (row[column] ?? '').trim();
}

export function rowToExercise(row: DatasetRow): Exercise | null {
  const title = text(row, 'Title');
  if (!title) return null;

  const category = text(row, 'Type') || 'Strength';
  const level = parseFitnessLevel(text(row, 'Level')) ?? 'Intermediate';
  const rating = Number.parseFloat(text(row, 'Rating'));

  return {
    exerciseId: exerciseIdForTitle(title),
    title,
    description: text(row, 'Desc'),
    category,
    bodyPart: text(row, 'BodyPart'),
    equipment: text(row, 'Equipment'),
    level,
    rating: Number.isFinite(rating) ? rating : 0,
    ratingDesc: text(row, 'RatingDesc'),
    metValue: metValueFor(category, level),
    videoUrl: null,
    videoDurationSeconds: null,
    isActive: true,
    usageCount: 0,
  };
}

export function parseDatasetCsv(input: string | Buffer): ParsedDataset {
  const rows: DatasetRow[] = parse(input, {
    columns: (header: string[]) => header.map((h) => h.trim()),
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });

  const exercises: Exercise[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const row of rows) {
    const exercise = rowToExercise(row);
    if (!exercise || seen.has(exercise.exerciseId)) {
      skipped++;
      continue;
    }
    seen.add(exercise.exerciseId);
    exercises.push(exercise);
  }

  return { total: rows.length, exercises, skipped };
}

/**
 * Upserts by exerciseId. Usage counters and the active flag of existing
 * exercises are kept.
 */
export async function loadDataset(input: string | Buffer): Promise<DatasetLoadResult> {
  const { total, exercises, skipped } = parseDatasetCsv(input);
  if (exercises.length === 0) return { total, loaded: 0, skipped };

  await ExerciseModel.bulkWrite(
    exercises.map(({ usageCount, isActive, lastUsedAt: _lastUsedAt, ...fields }) => ({
      updateOne: {
        filter: { exerciseId: fields.exerciseId },
        update: { $set: fields, $setOnInsert: { usageCount, isActive } },
        upsert: true,
      },
    }))
  );

  console.log(`✅ Loaded ${exercises.length} exercises (${skipped} skipped)`);
  return { total, loaded: exercises.length, skipped };
}
