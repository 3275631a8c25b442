/**
 * Session Logger
 *
 * Records per-exercise completion against a generated workout and turns
 * the log into status, history, calorie and usage summaries.
 * Write failures are surfaced to the caller.
 */

import {
  PHASES,
  type ExerciseLogEntry,
  type LogStatus,
  type NewExerciseLogEntry,
  type Phase,
  type PlannedExercise,
  type StoredWorkout,
  type WorkoutStatus,
} from '../types.js';
import type { LogStore, LogWindowStats, SettingsStore, WorkoutStore } from './stores.js';
import { isReadyForTraining, type ReadinessReport, type RetrainingHook } from './readiness.js';
import { InvalidRequestError, LogWriteError, NotFoundError, errorMessage } from '../lib/errors.js';
import { round1, round2 } from '../lib/random.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_COMPLETION_BUFFER = 2;
const TOP_EXERCISES = 10;
const MAX_PER_PAGE = 100;

export type LogExerciseInput = {
  userId: string;
  workoutId: string;
  exerciseId: string;
  phase?: Phase;
  plannedSets?: number;
  completedSets: number;
  plannedReps?: number;
  actualReps?: number[];
  weightUsedKg?: number;
  durationMinutes?: number;
  caloriesBurned?: number;
  difficultyRating?: number;
  notes?: string;
  status?: LogStatus;
};

export interface ProgressPublisher {
  exerciseLogged(entry: ExerciseLogEntry): void;
  workoutStatusChanged(workoutId: string, status: WorkoutStatus): void;
}

export type WorkoutProgress = {
  workoutId: string;
  status: WorkoutStatus | 'not_started';
  totalExercisesLogged: number;
  plannedExercises: number;
  completionPercentage: number;
  totalCaloriesBurned: number;
  totalDurationMinutes: number;
  entries: ExerciseLogEntry[];
};

export type HistoryPage = {
  userId: string;
  page: number;
  perPage: number;
  total: number;
  totalPages: number;
  items: ExerciseLogEntry[];
};

export type CalorieSummary = {
  userId: string;
  periodDays: number;
  totalCaloriesBurned: number;
  totalWorkouts: number;
  totalExercises: number;
  avgCaloriesPerWorkout: number;
};

export type WorkoutAnalytics = {
  userId: string;
  periodDays: number;
  calorieSummary: CalorieSummary;
  workoutFrequency: number;
  totalExercisesLogged: number;
  averageDifficulty: number;
  topExercises: Array<{ title: string; count: number }>;
};

export type SessionLoggerDeps = {
  logs: LogStore;
  workouts: WorkoutStore;
  settings: SettingsStore;
  publisher?: ProgressPublisher;
  retrainingHook?: RetrainingHook;
  now?: () => Date;
  /** How many sets beyond the plan a log may report. */
  completionBuffer?: number;
};

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isAmount(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function findPlanned(workout: StoredWorkout, exerciseId: string, phase?: Phase): PlannedExercise | undefined {
  const phases = phase ? [phase] : PHASES;
  for (const p of phases) {
    const found = workout.phases[p].find((e) => e.exercise.exerciseId === exerciseId);
    if (found) return found;
  }
  return undefined;
}

function distinct<T>(values: T[]): number {
  return new Set(values).size;
}

/** Share of the planned work that was done; a plan of zero sets counts as done once anything is logged. */
function completedShare(completedSets: number, plannedSets: number): number {
  if (plannedSets > 0) return completedSets / plannedSets;
  return completedSets > 0 ? 1 : 0;
}

export class SessionLogger {
  private readonly now: () => Date;
  private readonly completionBuffer: number;

  constructor(private readonly deps: SessionLoggerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.completionBuffer = deps.completionBuffer ?? DEFAULT_COMPLETION_BUFFER;
  }

  private async requireWorkout(workoutId: string, userId?: string): Promise<StoredWorkout> {
    const workout = await this.deps.workouts.findById(workoutId);
    if (!workout || (userId && workout.userId && workout.userId !== userId)) {
      throw new NotFoundError('Workout not found');
    }
    return workout;
  }

  async log(input: LogExerciseInput): Promise<ExerciseLogEntry> {
    const workout = await this.requireWorkout(input.workoutId, input.userId);
    const planned = findPlanned(workout, input.exerciseId, input.phase);
    if (!planned) throw new InvalidRequestError('Exercise is not part of this workout');

    const plannedSets = input.plannedSets ?? planned.sets;
    const plannedReps = input.plannedReps ?? planned.reps;
    const actualReps = input.actualReps ?? [];
    const difficultyRating = input.difficultyRating ?? 5;

    const problems: string[] = [];
    if (!isCount(plannedSets)) problems.push('plannedSets must be a non-negative integer');
    if (!isCount(input.completedSets)) problems.push('completedSets must be a non-negative integer');
    if (!isCount(plannedReps)) problems.push('plannedReps must be a non-negative integer');
    if (isCount(plannedSets) && isCount(input.completedSets) && input.completedSets > plannedSets + this.completionBuffer) {
      problems.push(`completedSets cannot exceed plannedSets + ${this.completionBuffer}`);
    }
    if (!actualReps.every(isCount)) problems.push('actualReps must contain non-negative integers');
    if (actualReps.length > input.completedSets) problems.push('actualReps cannot have more entries than completedSets');
    if (!Number.isInteger(difficultyRating) || difficultyRating < 1 || difficultyRating > 10) {
      problems.push('difficultyRating must be an integer between 1 and 10');
    }
    for (const field of ['weightUsedKg', 'durationMinutes', 'caloriesBurned'] as const) {
      const value = input[field];
      if (value !== undefined && !isAmount(value)) problems.push(`${field} must be >= 0`);
    }
    if (problems.length > 0) throw new InvalidRequestError('Invalid exercise log', problems);

    const share = completedShare(input.completedSets, plannedSets);
    const durationMinutes = input.durationMinutes ?? round1(planned.durationMinutes * share);
    const caloriesBurned = input.caloriesBurned ?? round1(planned.estimatedCalories * share);

    const entry: NewExerciseLogEntry = {
      userId: input.userId,
      workoutId: input.workoutId,
      exerciseId: input.exerciseId,
      exerciseTitle: planned.exercise.title,
      phase: planned.phase,
      plannedSets,
      completedSets: input.completedSets,
      plannedReps,
      actualReps,
      weightUsedKg: input.weightUsedKg ?? 0,
      durationMinutes,
      caloriesBurned,
      difficultyRating,
      notes: input.notes?.trim() ?? '',
      status: input.status ?? 'in_progress',
      completedAt: this.now(),
    };

    let logId: string;
    try {
      logId = await this.deps.logs.append(entry);
    } catch (err) {
      console.error(`[SessionLogger] Failed to log ${entry.exerciseId} for workout ${entry.workoutId}:`, err);
      throw new LogWriteError(err);
    }

    const saved: ExerciseLogEntry = { ...entry, logId };
    console.log(`[SessionLogger] Logged ${saved.exerciseTitle} (${saved.completedSets}/${saved.plannedSets} sets)`);

    // a completed workout stays completed
    const workoutStatus: WorkoutStatus = workout.status === 'completed' ? 'completed' : saved.status;
    if (workoutStatus !== workout.status) {
      try {
        await this.deps.workouts.setStatus(saved.workoutId, workoutStatus);
      } catch (err) {
        console.warn(`[SessionLogger] Entry ${logId} saved but workout ${saved.workoutId} status not updated: ${errorMessage(err)}`);
      }
    }

    this.publish((p) => {
      p.exerciseLogged(saved);
      p.workoutStatusChanged(saved.workoutId, workoutStatus);
    });
    return saved;
  }

  async status(workoutId: string, userId?: string): Promise<WorkoutProgress> {
    const workout = await this.requireWorkout(workoutId, userId);
    const entries = await this.deps.logs.forWorkout(workoutId);

    const plannedExercises = PHASES.reduce((n, p) => n + workout.phases[p].length, 0);
    const loggedExercises = distinct(entries.map((e) => e.exerciseId));

    return {
      workoutId,
      status: entries.length === 0 ? 'not_started' : workout.status,
      totalExercisesLogged: entries.length,
      plannedExercises,
      completionPercentage: plannedExercises > 0 ? round1(Math.min(100, (loggedExercises / plannedExercises) * 100)) : 0,
      totalCaloriesBurned: round1(entries.reduce((sum, e) => sum + e.caloriesBurned, 0)),
      totalDurationMinutes: round1(entries.reduce((sum, e) => sum + e.durationMinutes, 0)),
      entries,
    };
  }

  async complete(workoutId: string, userId?: string): Promise<{ workoutId: string; status: WorkoutStatus }> {
    await this.requireWorkout(workoutId, userId);
    const updated = await this.deps.workouts.setStatus(workoutId, 'completed');
    if (!updated) throw new NotFoundError('Workout not found');

    console.log(`[SessionLogger] Completed workout ${workoutId}`);
    this.publish((p) => p.workoutStatusChanged(workoutId, 'completed'));
    return { workoutId, status: 'completed' };
  }

  async history(userId: string, page = 1, perPage = 50): Promise<HistoryPage> {
    if (!Number.isInteger(page) || page < 1) throw new InvalidRequestError('page must be >= 1');
    if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
      throw new InvalidRequestError(`perPage must be between 1 and ${MAX_PER_PAGE}`);
    }

    const [total, items] = await Promise.all([
      this.deps.logs.count(userId),
      this.deps.logs.query(userId, { skip: (page - 1) * perPage, limit: perPage }),
    ]);

    return { userId, page, perPage, total, totalPages: Math.ceil(total / perPage), items };
  }

  private windowStats(userId: string, days: number): Promise<LogWindowStats> {
    const since = new Date(this.now().getTime() - days * DAY_MS);
    return this.deps.logs.summarize(userId, since, TOP_EXERCISES);
  }

  private summarizeCalories(userId: string, days: number, stats: LogWindowStats): CalorieSummary {
    return {
      userId,
      periodDays: days,
      totalCaloriesBurned: round1(stats.totalCalories),
      totalWorkouts: stats.workoutCount,
      totalExercises: stats.exerciseCount,
      avgCaloriesPerWorkout: stats.workoutCount > 0 ? round1(stats.totalCalories / stats.workoutCount) : 0,
    };
  }

  async calorieSummary(userId: string, days = 30): Promise<CalorieSummary> {
    if (!Number.isInteger(days) || days < 1) throw new InvalidRequestError('days must be a positive integer');
    return this.summarizeCalories(userId, days, await this.windowStats(userId, days));
  }

  async analytics(userId: string, days = 30): Promise<WorkoutAnalytics> {
    if (!Number.isInteger(days) || days < 1) throw new InvalidRequestError('days must be a positive integer');
    const stats = await this.windowStats(userId, days);

    return {
      userId,
      periodDays: days,
      calorieSummary: this.summarizeCalories(userId, days, stats),
      workoutFrequency: round2(stats.workoutCount / days),
      totalExercisesLogged: stats.exerciseCount,
      averageDifficulty: stats.exerciseCount > 0 ? round1(stats.difficultySum / stats.exerciseCount) : 5,
      topExercises: stats.topExercises,
    };
  }

  async readiness(userId: string): Promise<ReadinessReport> {
    const config = await this.deps.settings.getTrainingConfig();
    const { workoutCount: sessionCount } = await this.windowStats(userId, config.trainingWindowDays);
    const ready = isReadyForTraining(sessionCount, config);

    if (ready && this.deps.retrainingHook) {
      try {
        await this.deps.retrainingHook.onReady(userId, sessionCount);
      } catch (err) {
        console.warn(`[SessionLogger] Retraining hook failed for ${userId}: ${errorMessage(err)}`);
      }
    }

    return {
      userId,
      ready,
      sessionCount,
      trainingWindowDays: config.trainingWindowDays,
      minSessionsForTraining: config.minSessionsForTraining,
    };
  }

  private publish(emit: (publisher: ProgressPublisher) => void) {
    if (!this.deps.publisher) return;
    try {
      emit(this.deps.publisher);
    } catch (err) {
      console.warn(`[SessionLogger] Progress event not delivered: ${errorMessage(err)}`);
    }
  }
}
