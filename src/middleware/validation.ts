import { body, param, query, ValidationChain, validationResult } from 'express-validator';
import type { RequestHandler } from 'express';
import { FITNESS_LEVELS, PHASES, parseFitnessLevel } from '../types.js';
import { DURATION_LIMITS } from '../services/workoutGenerator.js';

/**
 * Runs the chains and rejects the request with every failure at once
 */
export const validate = (validations: ValidationChain[]): RequestHandler => {
  return async (req, res, next) => {
    await Promise.all(validations.map((validation) => validation.run(req)));

    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({
        error: 'Validation failed',
        details: errors.array(),
      });
      return;
    }

    next();
  };
};

const userIdParam = param('userId').trim().notEmpty().withMessage('userId is required');
const workoutIdParam = param('workoutId').trim().notEmpty().withMessage('workoutId is required');

const fitnessLevelRule = (chain: ValidationChain) =>
  chain
    .custom((value) => parseFitnessLevel(value) !== null)
    .withMessage(`fitnessLevel must be one of ${FITNESS_LEVELS.join(', ')}`)
    .customSanitizer((value) => parseFitnessLevel(value) ?? value);

/**
 * Exercise catalog filters
 */
export const exerciseFiltersValidation = [
  query('bodyPart').optional().trim().isLength({ min: 1, max: 100 }),
  query('equipment').optional().trim().isLength({ min: 1, max: 100 }),
  fitnessLevelRule(query('level').optional()),
  query('category').optional().trim().isLength({ min: 1, max: 100 }),
  query('limit').optional().isInt({ min: 1, max: 500 }).withMessage('limit must be between 1 and 500').toInt(),
];

/**
 * Generate workout
 */
export const generateWorkoutValidation = [
  userIdParam,
  body('targetBodyParts')
    .isArray({ min: 1, max: 20 })
    .withMessage('targetBodyParts must be a non-empty array'),
  body('targetBodyParts.*').isString().trim().notEmpty().withMessage('body parts must be non-empty strings'),
  body('durationMinutes')
    .isInt({ min: DURATION_LIMITS.min, max: DURATION_LIMITS.max })
    .withMessage(`durationMinutes must be between ${DURATION_LIMITS.min} and ${DURATION_LIMITS.max}`)
    .toInt(),
  body('weightKg')
    .isFloat({ min: 30, max: 250 })
    .withMessage('weightKg must be between 30 and 250')
    .toFloat(),
  fitnessLevelRule(body('fitnessLevel')),
  body('includeWarmup').optional().isBoolean().withMessage('includeWarmup must be a boolean').toBoolean(),
  body('includeStretches').optional().isBoolean().withMessage('includeStretches must be a boolean').toBoolean(),
  body('categories').optional().isArray({ min: 1, max: 10 }).withMessage('categories must be a non-empty array'),
  body('categories.*').optional().isString().trim().notEmpty(),
  body('seed').optional().isInt().withMessage('seed must be an integer').toInt(),
];

/**
 * Log exercise
 */
export const logExerciseValidation = [
  userIdParam,
  workoutIdParam,
  param('exerciseId').trim().notEmpty(),
  body('phase').optional().isIn([...PHASES]).withMessage(`phase must be one of ${PHASES.join(', ')}`),
  body('plannedSets').optional().isInt({ min: 0 }).withMessage('plannedSets must be >= 0').toInt(),
  body('completedSets').isInt({ min: 0 }).withMessage('completedSets must be >= 0').toInt(),
  body('plannedReps').optional().isInt({ min: 0 }).withMessage('plannedReps must be >= 0').toInt(),
  body('actualReps').optional().isArray({ max: 50 }).withMessage('actualReps must be an array'),
  body('actualReps.*').optional().isInt({ min: 0 }).withMessage('actualReps must be >= 0').toInt(),
  body('weightUsedKg').optional().isFloat({ min: 0 }).toFloat(),
  body('durationMinutes').optional().isFloat({ min: 0 }).toFloat(),
  body('caloriesBurned').optional().isFloat({ min: 0 }).toFloat(),
  body('difficultyRating')
    .optional()
    .isInt({ min: 1, max: 10 })
    .withMessage('difficultyRating must be between 1 and 10')
    .toInt(),
  body('notes').optional().isString().trim().isLength({ max: 1000 }).withMessage('notes must be at most 1000 characters'),
  body('status').optional().isIn(['in_progress', 'completed']),
];

export const workoutParamsValidation = [userIdParam, workoutIdParam];

/**
 * History & analytics
 */
export const historyValidation = [
  userIdParam,
  query('page').optional().isInt({ min: 1 }).withMessage('page must be >= 1').toInt(),
  query('perPage').optional().isInt({ min: 1, max: 100 }).withMessage('perPage must be between 1 and 100').toInt(),
];

export const analyticsValidation = [
  userIdParam,
  query('days').optional().isInt({ min: 1, max: 365 }).withMessage('days must be between 1 and 365').toInt(),
];

/**
 * Admin
 */
export const exerciseUpdateValidation = [
  param('exerciseId').trim().notEmpty(),
  body('description').optional().isString().trim().isLength({ max: 5000 }),
  body('videoUrl').optional({ values: 'null' }).isURL({ require_tld: false }).withMessage('videoUrl must be a URL'),
  body('videoDurationSeconds').optional({ values: 'null' }).isInt({ min: 0 }).toInt(),
  body('isActive').optional().isBoolean().toBoolean(),
];

export const trainingConfigValidation = [
  body('trainingWindowDays')
    .optional()
    .isInt({ min: 7, max: 90 })
    .withMessage('trainingWindowDays must be between 7 and 90')
    .toInt(),
  body('minSessionsForTraining')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('minSessionsForTraining must be between 1 and 100')
    .toInt(),
];
