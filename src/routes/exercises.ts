import { Router } from 'express';
import { ExerciseModel, type ExerciseDoc } from '../models/Exercise.js';
import { buildExerciseQuery, toExercise } from '../services/catalog.js';
import { exerciseFiltersValidation, validate } from '../middleware/validation.js';
import { NotFoundError } from '../lib/errors.js';
import { parseFitnessLevel, type ExerciseFilters } from '../types.js';
import { numberParam, stringParam } from '../lib/params.js';

const DEFAULT_LIMIT = 50;

export function createExercisesRouter() {
  const exercisesRouter = Router();

  exercisesRouter.get('/', validate(exerciseFiltersValidation), async (req, res, next) => {
    try {
      const filters: ExerciseFilters = {
        bodyPart: stringParam(req.query.bodyPart),
        equipment: stringParam(req.query.equipment),
        level: parseFitnessLevel(req.query.level) ?? undefined,
        category: stringParam(req.query.category),
      };
      const limit = numberParam(req.query.limit, DEFAULT_LIMIT);

      const docs = await ExerciseModel.find(buildExerciseQuery(filters))
        .sort({ rating: -1, title: 1 })
        .limit(limit)
        .lean<ExerciseDoc[]>();

      res.json({ count: docs.length, items: docs.map(toExercise) });
    } catch (err) {
      next(err);
    }
  });

  exercisesRouter.get('/:exerciseId', async (req, res, next) => {
    try {
      const doc = await ExerciseModel.findOne({ exerciseId: req.params.exerciseId }).lean<ExerciseDoc | null>();
      if (!doc) throw new NotFoundError('Exercise not found');

      res.json(toExercise(doc));
    } catch (err) {
      next(err);
    }
  });

  return exercisesRouter;
}
