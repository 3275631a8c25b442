import type { FitnessLevel } from '../types.js';
import { round1 } from '../lib/random.js';

/**
 * MET (Metabolic Equivalent of Task) values per exercise category.
 * Strength and Cardio depend on the fitness level, the rest do not.
 *
 * Formula: calories = MET × weight(kg) × time(hours)
 */
const LEVELED_MET: Record<string, Record<FitnessLevel, number>> = {
  strength: { Beginner: 3.5, Intermediate: 5.0, Expert: 6.0 },
  cardio: { Beginner: 5.0, Intermediate: 7.0, Expert: 10.0 },
};

const FIXED_MET: Record<string, number> = {
  stretching: 2.5,
  warmup: 4.0,
  plyometrics: 8.0,
  powerlifting: 6.0,
  'olympic weightlifting': 6.0,
  strongman: 7.0,
  crossfit: 8.0,
  hiit: 10.0,
  yoga: 2.5,
  pilates: 3.0,
  'circuit training': 8.0,
};

/** Used when a category has no table entry. */
export const DEFAULT_MET = 4.0;

const SECONDS_PER_REP: Record<string, number> = {
  strength: 4,
  cardio: 3,
  stretching: 30,
  warmup: 4,
  plyometrics: 2,
};
const DEFAULT_SECONDS_PER_REP = 3;

function key(category: string) {
  return category.trim().toLowerCase();
}

export function hasMetEntry(category: string): boolean {
  const k = key(category);
  return k in LEVELED_MET || k in FIXED_MET;
}

export function metValueFor(category: string, level: FitnessLevel): number {
  const k = key(category);

  const leveled = LEVELED_MET[k];
  if (leveled) return leveled[level] ?? leveled.Intermediate;

  const fixed = FIXED_MET[k];
  if (fixed !== undefined) return fixed;

  console.warn(`[Calories] No MET value for category "${category}", using default ${DEFAULT_MET}`);
  return DEFAULT_MET;
}

/** Zero for non-positive inputs. Not rounded. */
export function caloriesFromMet(met: number, weightKg: number, durationMinutes: number): number {
  if (met <= 0 || weightKg <= 0 || durationMinutes <= 0) return 0;
  return met * weightKg * (durationMinutes / 60);
}

export function estimateCalories(
  category: string,
  level: FitnessLevel,
  weightKg: number,
  durationMinutes: number
): number {
  return caloriesFromMet(metValueFor(category, level), weightKg, durationMinutes);
}

/**
 * Elapsed minutes for a set/rep scheme: work time plus rest between sets.
 */
export function estimateExerciseDuration(
  category: string,
  sets: number,
  reps: number,
  restSeconds = 60
): number {
  const perRep = SECONDS_PER_REP[key(category)] ?? DEFAULT_SECONDS_PER_REP;
  const work = sets * reps * perRep;
  const rest = sets > 1 ? restSeconds * (sets - 1) : 0;
  return round1((work + rest) / 60);
}

export function summarizeCalories(items: ReadonlyArray<{ estimatedCalories: number; durationMinutes: number }>) {
  let calories = 0;
  let durationMinutes = 0;
  for (const item of items) {
    calories += item.estimatedCalories;
    durationMinutes += item.durationMinutes;
  }
  return { calories: round1(calories), durationMinutes: round1(durationMinutes) };
}
