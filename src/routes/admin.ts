import { Router } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import crypto from 'node:crypto';
import type { AppContext } from '../context.js';
import { ExerciseModel, type ExerciseDoc } from '../models/Exercise.js';
import { toExercise } from '../services/catalog.js';
import { loadDataset } from '../lib/dataset.js';
import { HttpError, InvalidRequestError, NotFoundError, errorMessage } from '../lib/errors.js';
import { numberParam, optionalBoolean, optionalNumber } from '../lib/params.js';
import { exerciseUpdateValidation, trainingConfigValidation, validate } from '../middleware/validation.js';

const ALLOWED_DATASET_MIME = new Set(['text/csv', 'application/vnd.ms-excel', 'text/plain', 'application/octet-stream']);
const ALLOWED_VIDEO_MIME = new Set(['video/mp4', 'video/quicktime', 'video/webm']);
const MAX_DATASET_BYTES = 20 * 1024 * 1024;
const MAX_VIDEO_BYTES = 100 * 1024 * 1024;

function datasetFilter(_req: Express.Request, file: Express.Multer.File, cb: multer.FileFilterCallback) {
  const isCsv = path.extname(file.originalname || '').toLowerCase() === '.csv';
  if (!isCsv || !ALLOWED_DATASET_MIME.has(file.mimetype)) {
    cb(new HttpError(400, 'Dataset must be a .csv file'));
    return;
  }
  cb(null, true);
}

function videoFilter(_req: Express.Request, file: Express.Multer.File, cb: multer.FileFilterCallback) {
  if (!ALLOWED_VIDEO_MIME.has(file.mimetype)) {
    cb(new HttpError(400, 'Unsupported video type'));
    return;
  }
  cb(null, true);
}

function removeUpload(file: Express.Multer.File) {
  fs.promises.unlink(file.path).catch((err) => {
    console.warn(`[Admin] Could not remove ${file.filename}: ${errorMessage(err)}`);
  });
}

export function createAdminRouter({ config, settings }: AppContext) {
  const adminRouter = Router();

  const datasetUpload = multer({
    storage: multer.memoryStorage(),
    fileFilter: datasetFilter,
    limits: { files: 1, fileSize: MAX_DATASET_BYTES },
  });

  const videoUpload = multer({
    storage: multer.diskStorage({
      destination: (_req, _file, cb) => {
        fs.promises
          .mkdir(config.uploadsDir, { recursive: true })
          .then(() => cb(null, config.uploadsDir))
          .catch((err: Error) => cb(err, config.uploadsDir));
      },
      filename: (_req, file, cb) => {
        const ext = path.extname(file.originalname || '').slice(0, 16);
        cb(null, `${Date.now()}_${crypto.randomUUID()}${ext}`);
      },
    }),
    fileFilter: videoFilter,
    limits: { files: 1, fileSize: MAX_VIDEO_BYTES },
  });

  adminRouter.post('/dataset', datasetUpload.single('file'), async (req, res, next) => {
    try {
      if (!req.file) throw new InvalidRequestError('A CSV file is required in the "file" field');

      const result = await loadDataset(req.file.buffer);
      res.status(201).json(result);
    } catch (err) {
      next(err);
    }
  });

  adminRouter.put('/exercises/:exerciseId', validate(exerciseUpdateValidation), async (req, res, next) => {
    try {
      const body: Record<string, unknown> = req.body ?? {};
      const update: Partial<Pick<ExerciseDoc, 'description' | 'videoUrl' | 'videoDurationSeconds' | 'isActive'>> = {};

      if (typeof body.description === 'string') update.description = body.description;
      if (typeof body.videoUrl === 'string' || body.videoUrl === null) update.videoUrl = body.videoUrl;
      const videoDurationSeconds = optionalNumber(body.videoDurationSeconds);
      if (body.videoDurationSeconds === null) update.videoDurationSeconds = null;
      else if (videoDurationSeconds !== undefined) update.videoDurationSeconds = videoDurationSeconds;
      const isActive = optionalBoolean(body.isActive);
      if (isActive !== undefined) update.isActive = isActive;

      if (Object.keys(update).length === 0) throw new InvalidRequestError('Nothing to update');

      const doc = await ExerciseModel.findOneAndUpdate(
        { exerciseId: req.params.exerciseId },
        { $set: update },
        { new: true, runValidators: true }
      ).lean<ExerciseDoc | null>();
      if (!doc) throw new NotFoundError('Exercise not found');

      console.log(`[Admin] Updated exercise ${doc.exerciseId}: ${Object.keys(update).join(', ')}`);
      res.json(toExercise(doc));
    } catch (err) {
      next(err);
    }
  });

  adminRouter.post('/exercises/:exerciseId/video', videoUpload.single('file'), async (req, res, next) => {
    const file = req.file;
    try {
      if (!file) throw new InvalidRequestError('A video file is required in the "file" field');

      const videoUrl = `/uploads/${encodeURIComponent(file.filename)}`;
      const duration = numberParam(req.body?.durationSeconds, Number.NaN);

      const doc = await ExerciseModel.findOneAndUpdate(
        { exerciseId: req.params.exerciseId },
        {
          $set: {
            videoUrl,
            ...(Number.isInteger(duration) && duration >= 0 && { videoDurationSeconds: duration }),
          },
        },
        { new: true }
      ).lean<ExerciseDoc | null>();
      if (!doc) throw new NotFoundError('Exercise not found');

      res.status(201).json({
        exerciseId: doc.exerciseId,
        videoUrl,
        originalName: file.originalname,
        mimeType: file.mimetype,
        size: file.size,
      });
    } catch (err) {
      if (file) removeUpload(file);
      next(err);
    }
  });

  adminRouter.get('/training-config', async (_req, res, next) => {
    try {
      res.json(await settings.getTrainingConfig());
    } catch (err) {
      next(err);
    }
  });

  adminRouter.put('/training-config', validate(trainingConfigValidation), async (req, res, next) => {
    try {
      const body: Record<string, unknown> = req.body ?? {};
      const patch: { trainingWindowDays?: number; minSessionsForTraining?: number } = {};
      const trainingWindowDays = optionalNumber(body.trainingWindowDays);
      const minSessionsForTraining = optionalNumber(body.minSessionsForTraining);
      if (trainingWindowDays !== undefined) patch.trainingWindowDays = trainingWindowDays;
      if (minSessionsForTraining !== undefined) patch.minSessionsForTraining = minSessionsForTraining;

      if (Object.keys(patch).length === 0) throw new InvalidRequestError('Nothing to update');

      const updated = await settings.updateTrainingConfig(patch);
      console.log(`[Admin] Training config updated: window ${updated.trainingWindowDays}d, min ${updated.minSessionsForTraining}`);
      res.json(updated);
    } catch (err) {
      next(err);
    }
  });

  return adminRouter;
}
