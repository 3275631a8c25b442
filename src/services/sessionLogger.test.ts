/**
 * Session Logger Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionLogger, type ProgressPublisher } from './sessionLogger.js';
import { WorkoutGenerator } from './workoutGenerator.js';
import { InvalidRequestError, LogWriteError, NotFoundError } from '../lib/errors.js';
import { MemoryCatalog } from '../../tests/fakes/memoryCatalog.js';
import { MemoryLogStore, MemorySettingsStore, MemoryWorkoutStore } from '../../tests/fakes/memoryStores.js';
import type { RetrainingHook } from './readiness.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = new Date('2026-03-10T10:00:00Z');

type Harness = Awaited<ReturnType<typeof setup>>;

/**
 * Two emergency-only Beginner workouts for user-1 (70 kg, 30 minutes):
 * warmup Jumping Jacks, Arm Circles; main Push-ups, Bodyweight Squats, Plank;
 * stretch Hamstring Stretch, Quadriceps Stretch, Child's Pose, Chest Doorway Stretch.
 */
async function setup(options: { hook?: RetrainingHook; minSessions?: number } = {}) {
  let clock = START;
  let nextWorkout = 0;
  const generator = new WorkoutGenerator(new MemoryCatalog([]), {
    random: () => 0,
    now: () => clock,
    createId: () => `wk_${++nextWorkout}`,
  });

  const logs = new MemoryLogStore();
  const workouts = new MemoryWorkoutStore();
  const settings = new MemorySettingsStore({ trainingWindowDays: 30, minSessionsForTraining: options.minSessions ?? 5 });
  const publisher = {
    exerciseLogged: vi.fn<ProgressPublisher['exerciseLogged']>(),
    workoutStatusChanged: vi.fn<ProgressPublisher['workoutStatusChanged']>(),
  };

  const request = { userId: 'user-1', targetBodyParts: ['Chest'], durationMinutes: 30, weightKg: 70, fitnessLevel: 'Beginner' as const };
  for (let i = 0; i < 2; i++) {
    const workout = await generator.generate(request);
    await workouts.save({ ...workout, status: 'generated' });
  }

  const logger = new SessionLogger({
    logs,
    workouts,
    settings,
    publisher,
    retrainingHook: options.hook,
    now: () => clock,
  });

  return {
    logger,
    logs,
    workouts,
    publisher,
    setClock(at: Date) {
      clock = at;
    },
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// log
// ============================================================================

describe('SessionLogger.log', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await setup();
  });

  it('stores an entry with planned values and estimates filled in', async () => {
    const entry = await h.logger.log({
      userId: 'user-1',
      workoutId: 'wk_1',
      exerciseId: 'fallback_main_1',
      completedSets: 3,
      actualReps: [12, 10, 8],
    });

    // all 3 planned sets done: the planned 7.3 min and 3.5 MET x 70 kg x 7.3/60 h = 29.81 kcal
    expect(entry).toEqual({
      logId: 'log_1',
      userId: 'user-1',
      workoutId: 'wk_1',
      exerciseId: 'fallback_main_1',
      exerciseTitle: 'Push-ups',
      phase: 'main',
      plannedSets: 3,
      completedSets: 3,
      plannedReps: 12,
      actualReps: [12, 10, 8],
      weightUsedKg: 0,
      durationMinutes: 7.3,
      caloriesBurned: 29.8,
      difficultyRating: 5,
      notes: '',
      status: 'in_progress',
      completedAt: START,
    });
    expect(h.logs.entries).toHaveLength(1);
    expect((await h.workouts.findById('wk_1'))?.status).toBe('in_progress');
  });

  it('scales the planned estimate by the share of sets completed', async () => {
    const entry = await h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 1 });

    // 7.3 / 3 = 2.43 min; 29.81 / 3 = 9.94 kcal
    expect(entry.durationMinutes).toBe(2.4);
    expect(entry.caloriesBurned).toBe(9.9);
  });

  it('keeps values the caller reports', async () => {
    const entry = await h.logger.log({
      userId: 'user-1',
      workoutId: 'wk_1',
      exerciseId: 'fallback_stretch_1',
      completedSets: 2,
      durationMinutes: 3,
      caloriesBurned: 9,
      difficultyRating: 2,
      notes: '  tight hamstrings ',
      status: 'completed',
    });

    expect(entry).toMatchObject({
      phase: 'stretch',
      durationMinutes: 3,
      caloriesBurned: 9,
      difficultyRating: 2,
      notes: 'tight hamstrings',
      status: 'completed',
    });
  });

  it('publishes the entry and the workout status', async () => {
    const entry = await h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_2', completedSets: 1 });

    expect(h.publisher.exerciseLogged).toHaveBeenCalledWith(entry);
    expect(h.publisher.workoutStatusChanged).toHaveBeenCalledWith('wk_1', 'in_progress');
  });

  it('rejects more sets than planned plus the buffer', async () => {
    await expect(
      h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 6 })
    ).rejects.toMatchObject({
      status: 400,
      message: 'Invalid exercise log',
      details: ['completedSets cannot exceed plannedSets + 2'],
    });
    expect(h.logs.entries).toEqual([]);
  });

  it('accepts sets up to the buffer', async () => {
    const entry = await h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 5 });
    expect(entry.completedSets).toBe(5);
  });

  it('rejects malformed values', async () => {
    await expect(
      h.logger.log({
        userId: 'user-1',
        workoutId: 'wk_1',
        exerciseId: 'fallback_main_1',
        completedSets: 2,
        actualReps: [10, 10, 10],
        difficultyRating: 11,
      })
    ).rejects.toMatchObject({
      details: ['actualReps cannot have more entries than completedSets', 'difficultyRating must be an integer between 1 and 10'],
    });
  });

  it('rejects exercises that are not in the workout', async () => {
    await expect(
      h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_6', completedSets: 1 })
    ).rejects.toThrow(new InvalidRequestError('Exercise is not part of this workout'));
  });

  it('hides unknown workouts and workouts of other users', async () => {
    await expect(
      h.logger.log({ userId: 'user-1', workoutId: 'wk_missing', exerciseId: 'fallback_main_1', completedSets: 1 })
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      h.logger.log({ userId: 'user-2', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 1 })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('surfaces store failures and publishes nothing', async () => {
    h.logs.failing = true;

    await expect(
      h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 1 })
    ).rejects.toMatchObject({ status: 500, message: 'Failed to log exercise' });
    await expect(
      h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 1 })
    ).rejects.toBeInstanceOf(LogWriteError);
    expect(h.publisher.exerciseLogged).not.toHaveBeenCalled();
  });

  it('returns the saved entry when only the status update fails', async () => {
    h.workouts.statusFailing = true;

    const entry = await h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 1 });

    expect(entry.logId).toBe('log_1');
    expect(h.logs.entries).toHaveLength(1);
    expect((await h.workouts.findById('wk_1'))?.status).toBe('generated');
    expect(h.publisher.exerciseLogged).toHaveBeenCalledWith(entry);
  });

  it('does not reopen a completed workout', async () => {
    await h.logger.complete('wk_1', 'user-1');

    const entry = await h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_2', completedSets: 2 });

    expect(entry.status).toBe('in_progress');
    expect((await h.workouts.findById('wk_1'))?.status).toBe('completed');
    expect(h.publisher.workoutStatusChanged).toHaveBeenLastCalledWith('wk_1', 'completed');
  });

  it('still succeeds when the publisher throws', async () => {
    h.publisher.exerciseLogged.mockImplementation(() => {
      throw new Error('socket closed');
    });

    const entry = await h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1', completedSets: 1 });
    expect(entry.logId).toBe('log_1');
  });
});

// ============================================================================
// status / complete
// ============================================================================

describe('SessionLogger.status', () => {
  it('reports not_started before anything is logged', async () => {
    const h = await setup();

    expect(await h.logger.status('wk_1', 'user-1')).toMatchObject({
      status: 'not_started',
      totalExercisesLogged: 0,
      plannedExercises: 9,
      completionPercentage: 0,
      totalCaloriesBurned: 0,
    });
  });

  it('counts distinct exercises toward completion', async () => {
    const h = await setup();
    for (const exerciseId of ['fallback_main_1', 'fallback_main_1', 'fallback_main_2']) {
      await h.logger.log({ userId: 'user-1', workoutId: 'wk_1', exerciseId, completedSets: 1, caloriesBurned: 10 });
    }

    // 2 of 9 planned exercises
    expect(await h.logger.status('wk_1')).toMatchObject({
      status: 'in_progress',
      totalExercisesLogged: 3,
      completionPercentage: 22.2,
      totalCaloriesBurned: 30,
    });
  });
});

describe('SessionLogger.complete', () => {
  it('marks the workout completed and publishes it', async () => {
    const h = await setup();

    expect(await h.logger.complete('wk_2', 'user-1')).toEqual({ workoutId: 'wk_2', status: 'completed' });
    expect((await h.workouts.findById('wk_2'))?.status).toBe('completed');
    expect(h.publisher.workoutStatusChanged).toHaveBeenCalledWith('wk_2', 'completed');
  });

  it('rejects unknown workouts', async () => {
    const h = await setup();
    await expect(h.logger.complete('wk_missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});

// ============================================================================
// history / calories / analytics / readiness
// ============================================================================

/**
 * wk_1: Push-ups 100 kcal (difficulty 6)
 * wk_2: Push-ups 50 kcal (8), Plank 30 kcal (7)
 * plus a Plank 999 kcal entry 40 days before the others
 */
async function seedHistory(h: Harness) {
  h.setClock(new Date(START.getTime() - 40 * DAY_MS));
  await h.logger.log({ userId: 'user-1', workoutId: 'wk_2', exerciseId: 'fallback_main_3', completedSets: 1, caloriesBurned: 999 });

  const entries = [
    { workoutId: 'wk_1', exerciseId: 'fallback_main_1', caloriesBurned: 100, difficultyRating: 6 },
    { workoutId: 'wk_2', exerciseId: 'fallback_main_1', caloriesBurned: 50, difficultyRating: 8 },
    { workoutId: 'wk_2', exerciseId: 'fallback_main_3', caloriesBurned: 30, difficultyRating: 7 },
  ];
  for (const [i, e] of entries.entries()) {
    h.setClock(new Date(START.getTime() + i * 60_000));
    await h.logger.log({ userId: 'user-1', completedSets: 1, ...e });
  }
}

describe('SessionLogger.history', () => {
  it('pages newest first', async () => {
    const h = await setup();
    await seedHistory(h);

    const first = await h.logger.history('user-1', 1, 2);
    expect(first).toMatchObject({ page: 1, perPage: 2, total: 4, totalPages: 2 });
    expect(first.items.map((e) => e.caloriesBurned)).toEqual([30, 50]);

    const second = await h.logger.history('user-1', 2, 2);
    expect(second.items.map((e) => e.caloriesBurned)).toEqual([100, 999]);
  });

  it('bounds the page size', async () => {
    const h = await setup();
    await expect(h.logger.history('user-1', 1, 101)).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(h.logger.history('user-1', 0, 10)).rejects.toBeInstanceOf(InvalidRequestError);
  });
});

describe('SessionLogger.calorieSummary', () => {
  it('sums the entries inside the window', async () => {
    const h = await setup();
    await seedHistory(h);

    expect(await h.logger.calorieSummary('user-1', 30)).toEqual({
      userId: 'user-1',
      periodDays: 30,
      totalCaloriesBurned: 180,
      totalWorkouts: 2,
      totalExercises: 3,
      avgCaloriesPerWorkout: 90,
    });
  });

  it('counts every entry in the window, however many there are', async () => {
    const h = await setup();
    const first = await h.logger.log({
      userId: 'user-1',
      workoutId: 'wk_1',
      exerciseId: 'fallback_main_1',
      completedSets: 1,
      caloriesBurned: 1,
    });
    const { logId: _logId, ...copy } = first;
    for (let i = 1; i < 1200; i++) await h.logs.append(copy);

    expect(await h.logger.calorieSummary('user-1', 30)).toEqual({
      userId: 'user-1',
      periodDays: 30,
      totalCaloriesBurned: 1200,
      totalWorkouts: 1,
      totalExercises: 1200,
      avgCaloriesPerWorkout: 1200,
    });
  });

  it('is empty for a user without logs', async () => {
    const h = await setup();
    expect(await h.logger.calorieSummary('user-9')).toMatchObject({ totalCaloriesBurned: 0, avgCaloriesPerWorkout: 0 });
  });
});

describe('SessionLogger.analytics', () => {
  it('summarizes frequency, difficulty and favourite exercises', async () => {
    const h = await setup();
    await seedHistory(h);

    const analytics = await h.logger.analytics('user-1', 30);

    // 2 workouts / 30 days
    expect(analytics.workoutFrequency).toBe(0.07);
    expect(analytics.totalExercisesLogged).toBe(3);
    expect(analytics.averageDifficulty).toBe(7);
    expect(analytics.topExercises).toEqual([
      { title: 'Push-ups', count: 2 },
      { title: 'Plank', count: 1 },
    ]);
    expect(analytics.calorieSummary.totalCaloriesBurned).toBe(180);
  });

  it('defaults difficulty to 5 without logs', async () => {
    const h = await setup();
    expect((await h.logger.analytics('user-1')).averageDifficulty).toBe(5);
  });
});

describe('SessionLogger.readiness', () => {
  it('is ready once enough sessions fall inside the window', async () => {
    const onReady = vi.fn<RetrainingHook['onReady']>().mockResolvedValue(undefined);
    const h = await setup({ hook: { onReady }, minSessions: 2 });
    await seedHistory(h);

    expect(await h.logger.readiness('user-1')).toEqual({
      userId: 'user-1',
      ready: true,
      sessionCount: 2,
      trainingWindowDays: 30,
      minSessionsForTraining: 2,
    });
    expect(onReady).toHaveBeenCalledWith('user-1', 2);
  });

  it('is not ready below the threshold', async () => {
    const onReady = vi.fn<RetrainingHook['onReady']>().mockResolvedValue(undefined);
    const h = await setup({ hook: { onReady }, minSessions: 3 });
    await seedHistory(h);

    expect((await h.logger.readiness('user-1')).ready).toBe(false);
    expect(onReady).not.toHaveBeenCalled();
  });

  it('reports readiness even when the hook fails', async () => {
    const onReady = vi.fn<RetrainingHook['onReady']>().mockRejectedValue(new Error('queue full'));
    const h = await setup({ hook: { onReady }, minSessions: 1 });
    await seedHistory(h);

    expect((await h.logger.readiness('user-1')).ready).toBe(true);
  });
});
