import path from 'node:path';
import type { TrainingConfig } from './types.js';

export type AppConfig = {
  port: number;
  nodeEnv: string;
  mongoUri: string;
  mongoDbName: string;
  clientUrl: string;
  uploadsDir: string;
  /** Sets a log entry may report beyond the plan. */
  completionBuffer: number;
  trainingDefaults: TrainingConfig;
};

function intFrom(value: string | undefined, fallback: number) {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: intFrom(env.PORT, 8080),
    nodeEnv: env.NODE_ENV ?? 'development',
    mongoUri: env.MONGODB_URI || 'mongodb://localhost:27017/workouts',
    mongoDbName: env.MONGODB_DBNAME || 'workouts',
    clientUrl: env.CLIENT_URL || 'http://localhost:5173',
    uploadsDir: path.resolve(process.cwd(), env.UPLOADS_DIR || 'uploads'),
    completionBuffer: env.LOG_COMPLETION_BUFFER === '0' ? 0 : intFrom(env.LOG_COMPLETION_BUFFER, 2),
    trainingDefaults: {
      trainingWindowDays: intFrom(env.TRAINING_WINDOW_DAYS, 30),
      minSessionsForTraining: intFrom(env.MIN_SESSIONS_FOR_TRAINING, 5),
    },
  };
}
