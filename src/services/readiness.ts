import type { TrainingConfig } from '../types.js';

/**
 * Whether a user has logged enough sessions inside the training window to
 * justify retraining a personal model. Nothing is trained here.
 */
export function isReadyForTraining(
  sessionCount: number,
  config: Pick<TrainingConfig, 'minSessionsForTraining'>
): boolean {
  return sessionCount >= config.minSessionsForTraining;
}

/** Optional extension point, called when a user passes the gate. No implementation ships. */
export interface RetrainingHook {
  onReady(userId: string, sessionCount: number): Promise<void>;
}

export type ReadinessReport = {
  userId: string;
  ready: boolean;
  sessionCount: number;
  trainingWindowDays: number;
  minSessionsForTraining: number;
};
