import type { CascadeLevel, Exercise, ExerciseFilters, FitnessLevel, Phase } from '../types.js';
import type { ExerciseCatalog } from './catalog.js';
import { metValueFor } from './calories.js';
import { CatalogUnavailableError, errorMessage } from '../lib/errors.js';

/**
 * Relaxation steps tried in order. Each step says which constraints of the
 * phase query it still applies; `phase-purpose` drops them all and filters
 * by what the phase is for instead.
 */
type RelaxationStep = {
  level: Exclude<CascadeLevel, 'emergency'>;
  bodyPart: boolean;
  fitnessLevel: boolean;
  category: boolean;
};

export const RELAXATION_STEPS: readonly RelaxationStep[] = [
  { level: 'exact', bodyPart: true, fitnessLevel: true, category: true },
  { level: 'any-level', bodyPart: true, fitnessLevel: false, category: true },
  { level: 'any-body-part', bodyPart: false, fitnessLevel: true, category: true },
  { level: 'any-body-part-any-level', bodyPart: false, fitnessLevel: false, category: true },
  { level: 'phase-purpose', bodyPart: false, fitnessLevel: false, category: false },
];

export type PhaseQuery = {
  phase: Phase;
  /** Empty for generic phases (warmup, stretch). */
  bodyParts: string[];
  fitnessLevel: FitnessLevel;
  categories: string[];
  targetCount: number;
  /** Ids already picked for another phase of the same workout. */
  exclude?: ReadonlySet<string>;
};

export type CandidateTier = {
  level: CascadeLevel;
  exercises: Exercise[];
};

export type CascadeResult = {
  tiers: CandidateTier[];
  /** Relaxation levels whose query was actually sent to the catalog. */
  consulted: CascadeLevel[];
  catalogError?: string;
};

const QUERY_LIMIT = 50;
const PURPOSE_QUERY_LIMIT = 200;

const LIGHT_CATEGORIES = new Set(['warmup', 'cardio', 'plyometrics']);
const NON_MAIN_CATEGORIES = new Set(['stretching', 'warmup']);

export function servesPhase(phase: Phase, exercise: Exercise): boolean {
  const category = exercise.category.trim().toLowerCase();
  switch (phase) {
    case 'warmup':
      return LIGHT_CATEGORIES.has(category) || exercise.equipment.trim().toLowerCase() === 'body only';
    case 'main':
      return !NON_MAIN_CATEGORIES.has(category);
    case 'stretch':
      return category === 'stretching' || /stretch/i.test(exercise.title);
  }
}

function stepFilters(step: RelaxationStep, query: PhaseQuery): ExerciseFilters[] {
  const bodyParts: Array<string | undefined> = step.bodyPart && query.bodyParts.length > 0 ? query.bodyParts : [undefined];
  const categories: Array<string | undefined> = step.category ? query.categories : [undefined];
  const level = step.fitnessLevel ? query.fitnessLevel : undefined;

  const filters: ExerciseFilters[] = [];
  for (const bodyPart of bodyParts) {
    for (const category of categories) {
      filters.push({ bodyPart, category, level });
    }
  }
  return filters;
}

function filterKey(filters: ExerciseFilters[]) {
  return filters.map((f) => `${f.bodyPart ?? '*'}|${f.category ?? '*'}|${f.level ?? '*'}`).join(';');
}

/**
 * Walks the relaxation steps, accumulating unique candidates, and stops at
 * the first step after which there are enough of them. Falls through to the
 * emergency list only when the catalog produced nothing or failed.
 */
export async function collectCandidates(catalog: ExerciseCatalog, query: PhaseQuery): Promise<CascadeResult> {
  const seen = new Set<string>();
  const tiers: CandidateTier[] = [];
  const consulted: CascadeLevel[] = [];
  const queried = new Set<string>();
  const exclude = query.exclude ?? new Set<string>();
  let total = 0;

  try {
    for (const step of RELAXATION_STEPS) {
      if (total >= query.targetCount) break;

      const filters = step.level === 'phase-purpose' ? [{}] : stepFilters(step, query);
      const key = step.level === 'phase-purpose' ? 'purpose' : filterKey(filters);
      if (queried.has(key)) continue;
      queried.add(key);
      consulted.push(step.level);

      const limit = step.level === 'phase-purpose' ? PURPOSE_QUERY_LIMIT : QUERY_LIMIT;
      const results = await Promise.all(filters.map((f) => catalog.find(f, limit)));

      const fresh: Exercise[] = [];
      for (const exercise of results.flat()) {
        if (seen.has(exercise.exerciseId) || exclude.has(exercise.exerciseId)) continue;
        if (step.level === 'phase-purpose' && !servesPhase(query.phase, exercise)) continue;
        seen.add(exercise.exerciseId);
        fresh.push(exercise);
      }

      if (fresh.length > 0) {
        tiers.push({ level: step.level, exercises: fresh });
        total += fresh.length;
      }
    }
  } catch (err) {
    const reason = err instanceof CatalogUnavailableError ? err.message : errorMessage(err);
    console.warn(`[Cascade] Catalog query failed for ${query.phase} phase (${reason}), using emergency list`);
    return {
      tiers: [{ level: 'emergency', exercises: emergencyExercises(query.phase, query.fitnessLevel) }],
      consulted: [...consulted, 'emergency'],
      catalogError: reason,
    };
  }

  if (total === 0) {
    console.warn(`[Cascade] No catalog candidates for ${query.phase} phase, using emergency list`);
    tiers.push({ level: 'emergency', exercises: emergencyExercises(query.phase, query.fitnessLevel) });
    consulted.push('emergency');
  }

  return { tiers, consulted };
}

// ============================================================================
// Emergency list
// ============================================================================

type EmergencyEntry = {
  exerciseId: string;
  title: string;
  description: string;
  category: string;
  bodyPart: string;
  phase: Phase;
};

/** Bodyweight exercises that are safe for anyone; used when the catalog has nothing. */
export const EMERGENCY_EXERCISES: readonly EmergencyEntry[] = [
  { exerciseId: 'fallback_warmup_1', title: 'Jumping Jacks', description: 'Full body warmup to raise the heart rate', category: 'Cardio', bodyPart: 'Full Body', phase: 'warmup' },
  { exerciseId: 'fallback_warmup_2', title: 'Arm Circles', description: 'Shoulder mobility warmup', category: 'Warmup', bodyPart: 'Shoulders', phase: 'warmup' },
  { exerciseId: 'fallback_warmup_3', title: 'High Knees', description: 'Light running in place with high knees', category: 'Cardio', bodyPart: 'Full Body', phase: 'warmup' },
  { exerciseId: 'fallback_main_1', title: 'Push-ups', description: 'Basic upper body pressing exercise', category: 'Strength', bodyPart: 'Chest', phase: 'main' },
  { exerciseId: 'fallback_main_2', title: 'Bodyweight Squats', description: 'Fundamental lower body exercise', category: 'Strength', bodyPart: 'Quadriceps', phase: 'main' },
  { exerciseId: 'fallback_main_3', title: 'Plank', description: 'Core stability hold', category: 'Strength', bodyPart: 'Abdominals', phase: 'main' },
  { exerciseId: 'fallback_main_4', title: 'Lunges', description: 'Single leg strength exercise', category: 'Strength', bodyPart: 'Hamstrings', phase: 'main' },
  { exerciseId: 'fallback_main_5', title: 'Burpees', description: 'Full body compound movement', category: 'Strength', bodyPart: 'Full Body', phase: 'main' },
  { exerciseId: 'fallback_main_6', title: 'Mountain Climbers', description: 'Cardio and core exercise', category: 'Cardio', bodyPart: 'Full Body', phase: 'main' },
  { exerciseId: 'fallback_stretch_1', title: 'Hamstring Stretch', description: 'Stretch hamstrings and lower back', category: 'Stretching', bodyPart: 'Hamstrings', phase: 'stretch' },
  { exerciseId: 'fallback_stretch_2', title: 'Quadriceps Stretch', description: 'Standing quad stretch, hold each side', category: 'Stretching', bodyPart: 'Quadriceps', phase: 'stretch' },
  { exerciseId: 'fallback_stretch_3', title: "Child's Pose", description: 'Relaxing stretch for back and hips', category: 'Stretching', bodyPart: 'Lower Back', phase: 'stretch' },
  { exerciseId: 'fallback_stretch_4', title: 'Chest Doorway Stretch', description: 'Open the chest against a door frame', category: 'Stretching', bodyPart: 'Chest', phase: 'stretch' },
];

export const EMERGENCY_IDS: ReadonlySet<string> = new Set(EMERGENCY_EXERCISES.map((e) => e.exerciseId));

export function emergencyExercises(phase: Phase, level: FitnessLevel): Exercise[] {
  return EMERGENCY_EXERCISES.filter((e) => e.phase === phase).map((e) => ({
    exerciseId: e.exerciseId,
    title: e.title,
    description: e.description,
    category: e.category,
    bodyPart: e.bodyPart,
    equipment: 'Body Only',
    level,
    rating: 0,
    metValue: metValueFor(e.category, level),
    videoUrl: null,
    isActive: true,
    usageCount: 0,
  }));
}
