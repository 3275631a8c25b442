import type { AppConfig } from './config.js';
import { MongoExerciseCatalog, type ExerciseCatalog } from './services/catalog.js';
import { WorkoutGenerator } from './services/workoutGenerator.js';
import { SessionLogger, type ProgressPublisher } from './services/sessionLogger.js';
import {
  MongoLogStore,
  MongoSettingsStore,
  MongoWorkoutStore,
  type SettingsStore,
  type WorkoutStore,
} from './services/stores.js';
import type { RetrainingHook } from './services/readiness.js';

export type AppContext = {
  config: AppConfig;
  catalog: ExerciseCatalog;
  generator: WorkoutGenerator;
  sessionLogger: SessionLogger;
  workouts: WorkoutStore;
  settings: SettingsStore;
};

export type ContextOverrides = {
  publisher?: ProgressPublisher;
  retrainingHook?: RetrainingHook;
};

export function createContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  const catalog = new MongoExerciseCatalog();
  const workouts = new MongoWorkoutStore();
  const settings = new MongoSettingsStore(config.trainingDefaults);

  return {
    config,
    catalog,
    generator: new WorkoutGenerator(catalog),
    sessionLogger: new SessionLogger({
      logs: new MongoLogStore(),
      workouts,
      settings,
      publisher: overrides.publisher,
      retrainingHook: overrides.retrainingHook,
      completionBuffer: config.completionBuffer,
    }),
    workouts,
    settings,
  };
}
