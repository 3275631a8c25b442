/**
 * Workout Generator
 *
 * Builds a warmup / main / stretch workout from the exercise catalog.
 * Each phase queries the catalog through the fallback cascade, picks
 * exercises without replacement (recently used ones are less likely),
 * then attaches sets, reps, rest and calorie estimates.
 *
 * Generation never fails because data is missing: the cascade ends in a
 * built-in emergency list. Only malformed requests are rejected.
 */

import crypto from 'node:crypto';
import {
  PHASES,
  parseFitnessLevel,
  type CascadeLevel,
  type Exercise,
  type FitnessLevel,
  type GeneratedWorkout,
  type Phase,
  type PhaseSummary,
  type PlannedExercise,
  type WorkoutRequest,
} from '../types.js';
import type { ExerciseCatalog } from './catalog.js';
import { collectCandidates, emergencyExercises, EMERGENCY_IDS, type CandidateTier } from './cascade.js';
import { caloriesFromMet, metValueFor, summarizeCalories } from './calories.js';
import { InvalidRequestError, errorMessage } from '../lib/errors.js';
import { createSeededRandom, defaultRandom, round1, weightedSample, type Random } from '../lib/random.js';

// ============================================================================
// Constants
// ============================================================================

export const DURATION_LIMITS = { min: 1, max: 300 } as const;
export const MAIN_COUNT_LIMITS = { min: 3, max: 8 } as const;
export const MINUTES_PER_MAIN_EXERCISE = 8;
export const DEFAULT_MAIN_CATEGORIES = ['Strength'];

const WARMUP_MAX_MINUTES = 8;
const STRETCH_MAX_MINUTES = 7;
const MIN_EXERCISE_MINUTES = 0.1;

/** Main goes first so warmups and stretches only get what it leaves. */
const SELECTION_ORDER: readonly Phase[] = ['main', 'warmup', 'stretch'];

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_RECENCY_WINDOW_DAYS = 7;
/** Weight of an exercise used moments ago; rises linearly to 1 at the end of the window. */
const RECENCY_FLOOR = 0.2;

type Prescription = {
  sets: number;
  reps: number;
  restSeconds: number;
  holdSeconds?: number;
};

const MAIN_PRESCRIPTIONS: Record<FitnessLevel, Prescription> = {
  Beginner: { sets: 3, reps: 12, restSeconds: 60 },
  Intermediate: { sets: 4, reps: 10, restSeconds: 75 },
  Expert: { sets: 4, reps: 8, restSeconds: 90 },
};

const MAIN_NOTES: Record<FitnessLevel, string> = {
  Beginner: 'Focus on form and stop 2-3 reps short of failure.',
  Intermediate: 'Keep a controlled tempo; the last reps should feel challenging.',
  Expert: 'Push the final set close to failure with strict form.',
};

const WARMUP_NOTE = 'Move at an easy pace and work through the full range of motion.';
const STRETCH_NOTE = 'Hold each side for 30 seconds and breathe slowly; do not bounce.';
const EMERGENCY_NOTE = 'Bodyweight substitute: no matching exercise was available in the library.';

// ============================================================================
// Request validation
// ============================================================================

export type NormalizedWorkoutRequest = {
  userId?: string;
  targetBodyParts: string[];
  durationMinutes: number;
  weightKg: number;
  fitnessLevel: FitnessLevel;
  includeWarmup: boolean;
  includeStretches: boolean;
  categories: string[];
  seed?: number;
};

export function validateWorkoutRequest(request: WorkoutRequest): NormalizedWorkoutRequest {
  const problems: string[] = [];

  const targetBodyParts = Array.from(
    new Set((request.targetBodyParts ?? []).map((b) => String(b).trim()).filter(Boolean))
  );
  if (targetBodyParts.length === 0) problems.push('targetBodyParts must contain at least one body part');

  const duration = request.durationMinutes;
  if (!Number.isInteger(duration) || duration < DURATION_LIMITS.min || duration > DURATION_LIMITS.max) {
    problems.push(`durationMinutes must be an integer between ${DURATION_LIMITS.min} and ${DURATION_LIMITS.max}`);
  }

  if (!Number.isFinite(request.weightKg) || request.weightKg <= 0) problems.push('weightKg must be > 0');

  const fitnessLevel = parseFitnessLevel(request.fitnessLevel);
  if (!fitnessLevel) problems.push('fitnessLevel must be Beginner, Intermediate or Expert');

  const categories = request.categories
    ? Array.from(new Set(request.categories.map((c) => String(c).trim()).filter(Boolean)))
    : DEFAULT_MAIN_CATEGORIES;
  if (categories.length === 0) problems.push('categories must not be empty');

  if (request.seed !== undefined && !Number.isInteger(request.seed)) problems.push('seed must be an integer');

  if (problems.length > 0 || !fitnessLevel) {
    throw new InvalidRequestError('Invalid workout request', problems);
  }

  return {
    userId: request.userId,
    targetBodyParts,
    durationMinutes: duration,
    weightKg: request.weightKg,
    fitnessLevel,
    includeWarmup: request.includeWarmup ?? true,
    includeStretches: request.includeStretches ?? true,
    categories,
    seed: request.seed,
  };
}

// ============================================================================
// Pure helpers
// ============================================================================

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

export function mainExerciseCount(durationMinutes: number): number {
  return clamp(Math.floor(durationMinutes / MINUTES_PER_MAIN_EXERCISE), MAIN_COUNT_LIMITS.min, MAIN_COUNT_LIMITS.max);
}

export function warmupExerciseCount(durationMinutes: number): number {
  return durationMinutes < 45 ? 2 : 3;
}

export function stretchExerciseCount(durationMinutes: number): number {
  if (durationMinutes < 30) return 3;
  if (durationMinutes < 60) return 4;
  return 5;
}

export function targetCount(phase: Phase, durationMinutes: number): number {
  switch (phase) {
    case 'warmup':
      return warmupExerciseCount(durationMinutes);
    case 'main':
      return mainExerciseCount(durationMinutes);
    case 'stretch':
      return stretchExerciseCount(durationMinutes);
  }
}

/** Minutes allotted to each phase; disabled phases get 0. */
export function phaseBudget(
  durationMinutes: number,
  includeWarmup: boolean,
  includeStretches: boolean
): Record<Phase, number> {
  const warmup = includeWarmup ? Math.min(WARMUP_MAX_MINUTES, durationMinutes * 0.15) : 0;
  const stretch = includeStretches ? Math.min(STRETCH_MAX_MINUTES, durationMinutes * 0.12) : 0;
  return { warmup, main: durationMinutes - warmup - stretch, stretch };
}

export function prescriptionFor(phase: Phase, level: FitnessLevel, category: string): Prescription {
  switch (phase) {
    case 'main':
      return MAIN_PRESCRIPTIONS[level];
    case 'warmup': {
      const c = category.trim().toLowerCase();
      return { sets: 1, reps: c === 'cardio' || c === 'plyometrics' ? 20 : 10, restSeconds: 15 };
    }
    case 'stretch':
      return { sets: 2, reps: 1, restSeconds: 10, holdSeconds: 30 };
  }
}

export function recencyWeight(
  lastUsedAt: Date | undefined,
  now: Date,
  windowDays = DEFAULT_RECENCY_WINDOW_DAYS
): number {
  if (!lastUsedAt) return 1;
  const ageDays = Math.max(0, (now.getTime() - lastUsedAt.getTime()) / DAY_MS);
  if (ageDays >= windowDays) return 1;
  return RECENCY_FLOOR + ((1 - RECENCY_FLOOR) * ageDays) / windowDays;
}

export type Selection = { exercise: Exercise; level: CascadeLevel };

/**
 * Fills `count` slots tier by tier, so a relaxed tier is only drawn from
 * once every stricter tier is used up.
 */
export function selectFromTiers(
  tiers: readonly CandidateTier[],
  count: number,
  random: Random,
  weightOf: (exercise: Exercise) => number = () => 1
): Selection[] {
  const picked: Selection[] = [];
  for (const tier of tiers) {
    if (picked.length >= count) break;
    for (const exercise of weightedSample(tier.exercises, count - picked.length, random, weightOf)) {
      picked.push({ exercise, level: tier.level });
    }
  }
  return picked;
}

/** Tops a short main phase up to `min` with emergency exercises not already chosen. */
export function padWithEmergency(
  selections: readonly Selection[],
  min: number,
  level: FitnessLevel,
  random: Random
): Selection[] {
  const chosen = new Set(selections.map((s) => s.exercise.exerciseId));
  const spare = emergencyExercises('main', level).filter((e) => !chosen.has(e.exerciseId));
  return weightedSample(spare, min - selections.length, random).map((exercise) => ({
    exercise,
    level: 'emergency' as const,
  }));
}

function notesFor(phase: Phase, level: FitnessLevel, emergency: boolean) {
  const base = phase === 'main' ? MAIN_NOTES[level] : phase === 'warmup' ? WARMUP_NOTE : STRETCH_NOTE;
  return emergency ? `${base} ${EMERGENCY_NOTE}` : base;
}

export function planExercise(
  selection: Selection,
  phase: Phase,
  order: number,
  minutes: number,
  request: Pick<NormalizedWorkoutRequest, 'fitnessLevel' | 'weightKg'>
): PlannedExercise {
  const { exercise, level } = selection;
  const rx = prescriptionFor(phase, request.fitnessLevel, exercise.category);
  const metValue = metValueFor(phase === 'stretch' ? 'Stretching' : exercise.category, request.fitnessLevel);
  const emergency = level === 'emergency';

  return {
    exercise: {
      exerciseId: exercise.exerciseId,
      title: exercise.title,
      description: exercise.description,
      category: exercise.category,
      bodyPart: exercise.bodyPart,
      equipment: exercise.equipment,
      level: exercise.level,
      videoUrl: exercise.videoUrl ?? null,
    },
    phase,
    order,
    ...rx,
    durationMinutes: minutes,
    metValue,
    estimatedCalories: caloriesFromMet(metValue, request.weightKg, minutes),
    notes: notesFor(phase, request.fitnessLevel, emergency),
    source: emergency ? 'emergency' : 'catalog',
    fallbackLevel: level,
  };
}

function summarize(items: PlannedExercise[]): PhaseSummary {
  const { calories, durationMinutes } = summarizeCalories(items);
  return { calories, durationMinutes, exerciseCount: items.length };
}

// ============================================================================
// Generator
// ============================================================================

export type WorkoutGeneratorOptions = {
  random?: Random;
  now?: () => Date;
  createId?: () => string;
  recencyWindowDays?: number;
};

export class WorkoutGenerator {
  private readonly random: Random;
  private readonly now: () => Date;
  private readonly createId: () => string;
  private readonly recencyWindowDays: number;

  constructor(private readonly catalog: ExerciseCatalog, options: WorkoutGeneratorOptions = {}) {
    this.random = options.random ?? defaultRandom;
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => `wk_${crypto.randomUUID()}`);
    this.recencyWindowDays = options.recencyWindowDays ?? DEFAULT_RECENCY_WINDOW_DAYS;
  }

  async generate(request: WorkoutRequest): Promise<GeneratedWorkout> {
    const req = validateWorkoutRequest(request);
    const random = req.seed !== undefined ? createSeededRandom(req.seed) : this.random;
    const now = this.now();
    const budget = phaseBudget(req.durationMinutes, req.includeWarmup, req.includeStretches);

    const phases: Record<Phase, PlannedExercise[]> = { warmup: [], main: [], stretch: [] };
    const picked = new Set<string>();

    for (const phase of SELECTION_ORDER) {
      if (budget[phase] <= 0) continue;

      const result = await collectCandidates(this.catalog, {
        phase,
        bodyParts: phase === 'main' ? req.targetBodyParts : [],
        fitnessLevel: req.fitnessLevel,
        categories: phase === 'main' ? req.categories : phase === 'warmup' ? ['Warmup'] : ['Stretching'],
        targetCount: targetCount(phase, req.durationMinutes),
        exclude: picked,
      });

      const candidates = result.tiers.flatMap((t) => t.exercises);
      const recency = await this.loadRecency(req.userId, candidates);
      const weightOf = (exercise: Exercise) => recencyWeight(recency.get(exercise.exerciseId), now, this.recencyWindowDays);

      const selections = selectFromTiers(result.tiers, targetCount(phase, req.durationMinutes), random, weightOf);
      if (phase === 'main' && selections.length < MAIN_COUNT_LIMITS.min) {
        selections.push(...padWithEmergency(selections, MAIN_COUNT_LIMITS.min, req.fitnessLevel, random));
      }
      if (selections.length === 0) continue;

      const minutes = Math.max(MIN_EXERCISE_MINUTES, round1(budget[phase] / selections.length));
      phases[phase] = selections.map((s, i) => planExercise(s, phase, i + 1, minutes, req));
      for (const s of selections) picked.add(s.exercise.exerciseId);
    }

    await this.recordUsage(phases, now);

    const all = [...phases.warmup, ...phases.main, ...phases.stretch];
    const totals = summarizeCalories(all);

    const workout: GeneratedWorkout = {
      workoutId: this.createId(),
      userId: req.userId,
      fitnessLevel: req.fitnessLevel,
      weightKg: req.weightKg,
      targetBodyParts: req.targetBodyParts,
      phases,
      summaries: {
        warmup: summarize(phases.warmup),
        main: summarize(phases.main),
        stretch: summarize(phases.stretch),
      },
      totalDurationMinutes: totals.durationMinutes,
      totalCalories: totals.calories,
      createdAt: now,
    };

    console.log(`[WorkoutGenerator] Generated ${workout.workoutId} with ${all.length} exercises (${workout.totalCalories} kcal)`);
    return workout;
  }

  private async loadRecency(userId: string | undefined, candidates: Exercise[]): Promise<Map<string, Date>> {
    const ids = candidates.map((c) => c.exerciseId).filter((id) => !EMERGENCY_IDS.has(id));
    if (!userId || ids.length === 0) return new Map();

    try {
      return await this.catalog.recentlyUsed(userId, ids);
    } catch (err) {
      console.warn(`[WorkoutGenerator] Recency lookup failed, selecting uniformly: ${errorMessage(err)}`);
      return new Map();
    }
  }

  private async recordUsage(phases: Record<Phase, PlannedExercise[]>, at: Date) {
    const ids = PHASES.flatMap((p) => phases[p])
      .filter((p) => p.source === 'catalog')
      .map((p) => p.exercise.exerciseId);
    if (ids.length === 0) return;

    try {
      await this.catalog.markUsed(ids, at);
    } catch (err) {
      console.warn(`[WorkoutGenerator] Could not record exercise usage: ${errorMessage(err)}`);
    }
  }
}
