import { Router } from 'express';
import type { AppContext } from '../context.js';
import { generateWorkoutValidation, logExerciseValidation, validate, workoutParamsValidation } from '../middleware/validation.js';
import { NotFoundError } from '../lib/errors.js';
import { parseFitnessLevel, PHASES, type LogStatus, type Phase, type StoredWorkout } from '../types.js';
import { numberList, numberParam, optionalBoolean, optionalNumber, stringList } from '../lib/params.js';

function phaseOf(value: unknown): Phase | undefined {
  return PHASES.find((p) => p === value);
}

function logStatusOf(value: unknown): LogStatus | undefined {
  return value === 'in_progress' || value === 'completed' ? value : undefined;
}

export function createWorkoutsRouter({ generator, sessionLogger, workouts }: AppContext) {
  const workoutsRouter = Router();

  workoutsRouter.post('/:userId/workouts/generate', validate(generateWorkoutValidation), async (req, res, next) => {
    try {
      const body: Record<string, unknown> = req.body ?? {};
      const workout = await generator.generate({
        userId: req.params.userId,
        targetBodyParts: stringList(body.targetBodyParts) ?? [],
        durationMinutes: numberParam(body.durationMinutes, Number.NaN),
        weightKg: numberParam(body.weightKg, Number.NaN),
        fitnessLevel: parseFitnessLevel(body.fitnessLevel) ?? 'Intermediate',
        includeWarmup: optionalBoolean(body.includeWarmup),
        includeStretches: optionalBoolean(body.includeStretches),
        categories: stringList(body.categories),
        seed: optionalNumber(body.seed),
      });

      const stored: StoredWorkout = { ...workout, status: 'generated' };
      await workouts.save(stored);

      res.status(201).json(stored);
    } catch (err) {
      next(err);
    }
  });

  workoutsRouter.get('/:userId/workouts/:workoutId', validate(workoutParamsValidation), async (req, res, next) => {
    try {
      const workout = await workouts.findById(req.params.workoutId);
      if (!workout || (workout.userId && workout.userId !== req.params.userId)) {
        throw new NotFoundError('Workout not found');
      }

      res.json(workout);
    } catch (err) {
      next(err);
    }
  });

  workoutsRouter.post(
    '/:userId/workouts/:workoutId/exercises/:exerciseId/log',
    validate(logExerciseValidation),
    async (req, res, next) => {
      try {
        const body: Record<string, unknown> = req.body ?? {};
        const entry = await sessionLogger.log({
          userId: req.params.userId,
          workoutId: req.params.workoutId,
          exerciseId: req.params.exerciseId,
          phase: phaseOf(body.phase),
          plannedSets: optionalNumber(body.plannedSets),
          completedSets: numberParam(body.completedSets, Number.NaN),
          plannedReps: optionalNumber(body.plannedReps),
          actualReps: numberList(body.actualReps),
          weightUsedKg: optionalNumber(body.weightUsedKg),
          durationMinutes: optionalNumber(body.durationMinutes),
          caloriesBurned: optionalNumber(body.caloriesBurned),
          difficultyRating: optionalNumber(body.difficultyRating),
          notes: typeof body.notes === 'string' ? body.notes : undefined,
          status: logStatusOf(body.status),
        });

        res.status(201).json(entry);
      } catch (err) {
        next(err);
      }
    }
  );

  workoutsRouter.get('/:userId/workouts/:workoutId/status', validate(workoutParamsValidation), async (req, res, next) => {
    try {
      res.json(await sessionLogger.status(req.params.workoutId, req.params.userId));
    } catch (err) {
      next(err);
    }
  });

  workoutsRouter.post('/:userId/workouts/:workoutId/complete', validate(workoutParamsValidation), async (req, res, next) => {
    try {
      res.json(await sessionLogger.complete(req.params.workoutId, req.params.userId));
    } catch (err) {
      next(err);
    }
  });

  return workoutsRouter;
}
