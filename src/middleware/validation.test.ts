import { validationResult, type ValidationChain } from 'express-validator';
import { describe, expect, it } from 'vitest';
import {
  analyticsValidation,
  exerciseFiltersValidation,
  generateWorkoutValidation,
  logExerciseValidation,
  trainingConfigValidation,
} from './validation.js';

type FakeRequest = {
  params?: Record<string, string>;
  query?: Record<string, unknown>;
  body?: Record<string, unknown>;
};

async function failedFields(chains: ValidationChain[], req: FakeRequest) {
  await Promise.all(chains.map((chain) => chain.run(req)));
  return validationResult(req)
    .array()
    .map((e) => (e.type === 'field' ? e.path : e.type))
    .sort();
}

describe('generateWorkoutValidation', () => {
  it('accepts and normalizes a valid request', async () => {
    const req = {
      params: { userId: 'user-1' },
      body: { targetBodyParts: ['Chest'], durationMinutes: '45', weightKg: 72.5, fitnessLevel: 'expert', includeWarmup: 'false' },
    };

    expect(await failedFields(generateWorkoutValidation, req)).toEqual([]);
    expect(req.body).toMatchObject({ durationMinutes: 45, weightKg: 72.5, fitnessLevel: 'Expert', includeWarmup: false });
  });

  it('reports each invalid field', async () => {
    const req = {
      params: { userId: 'user-1' },
      body: { targetBodyParts: [], durationMinutes: 400, weightKg: 20, fitnessLevel: 'pro' },
    };

    expect(await failedFields(generateWorkoutValidation, req)).toEqual([
      'durationMinutes',
      'fitnessLevel',
      'targetBodyParts',
      'weightKg',
    ]);
  });
});

describe('logExerciseValidation', () => {
  it('requires completed sets and bounds difficulty', async () => {
    const req = {
      params: { userId: 'user-1', workoutId: 'wk_1', exerciseId: 'fallback_main_1' },
      body: { difficultyRating: 11, phase: 'cooldown' },
    };

    expect(await failedFields(logExerciseValidation, req)).toEqual(['completedSets', 'difficultyRating', 'phase']);
  });
});

describe('query validation', () => {
  it('bounds the exercise limit', async () => {
    expect(await failedFields(exerciseFiltersValidation, { query: { limit: '501' } })).toEqual(['limit']);
    expect(await failedFields(exerciseFiltersValidation, { query: { limit: '20', level: 'beginner' } })).toEqual([]);
  });

  it('bounds the analytics window', async () => {
    expect(await failedFields(analyticsValidation, { params: { userId: 'user-1' }, query: { days: '366' } })).toEqual([
      'days',
    ]);
  });
});

describe('trainingConfigValidation', () => {
  it('keeps values inside their ranges', async () => {
    expect(await failedFields(trainingConfigValidation, { body: { trainingWindowDays: 6, minSessionsForTraining: 101 } })).toEqual([
      'minSessionsForTraining',
      'trainingWindowDays',
    ]);
    expect(await failedFields(trainingConfigValidation, { body: { trainingWindowDays: 14 } })).toEqual([]);
  });
});
