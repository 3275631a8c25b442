/**
 * Calorie Estimator Tests
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_MET,
  caloriesFromMet,
  estimateCalories,
  estimateExerciseDuration,
  hasMetEntry,
  metValueFor,
  summarizeCalories,
} from './calories.js';

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// metValueFor
// ============================================================================

describe('metValueFor', () => {
  it('scales strength and cardio with fitness level', () => {
    expect(metValueFor('Strength', 'Beginner')).toBe(3.5);
    expect(metValueFor('Strength', 'Intermediate')).toBe(5.0);
    expect(metValueFor('Strength', 'Expert')).toBe(6.0);
    expect(metValueFor('Cardio', 'Beginner')).toBe(5.0);
    expect(metValueFor('Cardio', 'Expert')).toBe(10.0);
  });

  it('uses fixed values for the other categories', () => {
    expect(metValueFor('Stretching', 'Expert')).toBe(2.5);
    expect(metValueFor('Plyometrics', 'Beginner')).toBe(8.0);
    expect(metValueFor('Olympic Weightlifting', 'Intermediate')).toBe(6.0);
    expect(metValueFor('Strongman', 'Intermediate')).toBe(7.0);
  });

  it('matches categories case-insensitively', () => {
    expect(metValueFor('  strength ', 'Expert')).toBe(6.0);
    expect(metValueFor('HIIT', 'Beginner')).toBe(10.0);
  });

  it('falls back to the default MET and warns for unknown categories', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(metValueFor('Underwater Basket Weaving', 'Expert')).toBe(DEFAULT_MET);
    expect(DEFAULT_MET).toBe(4.0);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('reports which categories have table entries', () => {
    expect(hasMetEntry('Cardio')).toBe(true);
    expect(hasMetEntry('circuit training')).toBe(true);
    expect(hasMetEntry('Juggling')).toBe(false);
  });
});

// ============================================================================
// caloriesFromMet / estimateCalories
// ============================================================================

describe('caloriesFromMet', () => {
  it('applies MET x weight x hours', () => {
    // 5.0 x 75 kg x 10/60 h
    expect(caloriesFromMet(5.0, 75, 10)).toBeCloseTo(62.5, 6);
    // 3.5 x 70 kg x 1 h
    expect(caloriesFromMet(3.5, 70, 60)).toBeCloseTo(245, 6);
  });

  it('returns zero for non-positive inputs', () => {
    expect(caloriesFromMet(5, 0, 10)).toBe(0);
    expect(caloriesFromMet(5, 70, 0)).toBe(0);
    expect(caloriesFromMet(5, -70, 10)).toBe(0);
    expect(caloriesFromMet(0, 70, 10)).toBe(0);
  });

  it('estimates from category and level', () => {
    expect(estimateCalories('Strength', 'Intermediate', 75, 10)).toBeCloseTo(62.5, 6);
  });

  it('uses the default MET for unknown categories', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    // 4.0 x 60 kg x 30/60 h
    expect(estimateCalories('Parkour', 'Beginner', 60, 30)).toBeCloseTo(120, 6);
  });
});

// ============================================================================
// estimateExerciseDuration
// ============================================================================

describe('estimateExerciseDuration', () => {
  it('adds rest between sets to the work time', () => {
    // 3 x 10 x 4 s = 120 s work, 2 x 60 s rest = 120 s
    expect(estimateExerciseDuration('Strength', 3, 10, 60)).toBe(4);
  });

  it('does not add rest after a single set', () => {
    // 1 x 20 x 3 s = 60 s
    expect(estimateExerciseDuration('Cardio', 1, 20, 90)).toBe(1);
  });

  it('treats each stretching rep as a 30 second hold', () => {
    // 2 x 1 x 30 s + 10 s rest = 70 s
    expect(estimateExerciseDuration('Stretching', 2, 1, 10)).toBe(1.2);
  });

  it('uses 3 seconds per rep for categories without a tempo', () => {
    // 1 x 10 x 3 s = 30 s
    expect(estimateExerciseDuration('Yoga', 1, 10)).toBe(0.5);
  });
});

describe('summarizeCalories', () => {
  it('sums and rounds to one decimal', () => {
    expect(
      summarizeCalories([
        { estimatedCalories: 10.04, durationMinutes: 2.5 },
        { estimatedCalories: 20.02, durationMinutes: 3.25 },
      ])
    ).toEqual({ calories: 30.1, durationMinutes: 5.8 });
  });

  it('returns zeros for an empty phase', () => {
    expect(summarizeCalories([])).toEqual({ calories: 0, durationMinutes: 0 });
  });
});
