import { Router } from 'express';
import multer from 'multer';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { badRequest, notFound } from '../errors.js';
import { EXPORTED_VIEWS } from '../pipeline/publisher.js';
import type { PipelineRunner } from '../services/pipeline-runner.js';
import { asyncHandler } from '../utils/async-handler.js';

const thresholdField = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.coerce.number().min(0).max(1).optional()
);

const runRequestSchema = z.object({
  preCleanThreshold: thresholdField,
  postCleanThreshold: thresholdField,
});

const runParamsSchema = z.object({
  runId: z.string().uuid(),
});

const exportParamsSchema = runParamsSchema.extend({
  view: z.enum(EXPORTED_VIEWS),
});

function sanitizeUploadFilename(filename: string): string {
  const base = path.basename(filename);
  const safe = base.replace(/[^a-zA-Z0-9._-]/g, '_');
  if (!safe || safe.startsWith('.')) {
    throw badRequest('invalid filename');
  }
  return safe;
}

export function createPipelineRunsRouter(config: AppConfig, runner: PipelineRunner): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      files: 1,
      fileSize: config.uploadMaxFileSize,
    },
  });

  async function storeUpload(file: Express.Multer.File): Promise<string> {
    if (path.extname(file.originalname).toLowerCase() !== '.csv') {
      throw badRequest(`unsupported file type: ${file.originalname}`);
    }
    const sessionId = `session-${new Date().toISOString().replace(/[:.]/g, '-')}-${randomUUID().slice(0, 8)}`;
    const sessionDir = path.join(config.uploadDir, sessionId);
    await fsp.mkdir(sessionDir, { recursive: true });
    const target = path.join(sessionDir, sanitizeUploadFilename(file.originalname));
    await fsp.writeFile(target, file.buffer);
    return target;
  }

  router.post(
    '/runs',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const parsed = runRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw badRequest('invalid request', parsed.error.flatten());
      }

      const thresholds: { preClean?: number; postClean?: number } = {};
      if (parsed.data.preCleanThreshold !== undefined) thresholds.preClean = parsed.data.preCleanThreshold;
      if (parsed.data.postCleanThreshold !== undefined) thresholds.postClean = parsed.data.postCleanThreshold;

      const inputPath = req.file ? await storeUpload(req.file) : config.inputPath;
      const run = runner.enqueue({
        inputPath,
        thresholds,
        source: req.file ? 'upload' : 'configured',
      });

      res.status(202).json({
        status: run.status,
        runId: run.id,
        inputPath: run.inputPath,
        thresholds: run.thresholds,
        message: 'Pipeline run accepted. Processing will run asynchronously.',
      });
    })
  );

  router.get('/runs', (_req, res) => {
    res.json({ runs: runner.list() });
  });

  router.get(
    '/runs/:runId/status',
    asyncHandler(async (req, res) => {
      const { runId } = runParamsSchema.parse(req.params);
      const run = runner.get(runId);
      if (!run) {
        throw notFound('pipeline run not found');
      }
      const { profiles: _profiles, ...status } = run;
      res.json(status);
    })
  );

  router.get(
    '/runs/:runId/profiles',
    asyncHandler(async (req, res) => {
      const { runId } = runParamsSchema.parse(req.params);
      const run = runner.get(runId);
      if (!run) {
        throw notFound('pipeline run not found');
      }
      res.json(run.profiles);
    })
  );

  router.get(
    '/runs/:runId/exports/:view',
    asyncHandler(async (req, res) => {
      const { runId, view } = exportParamsSchema.parse(req.params);
      const filePath = runner.exportPath(runId, view);
      if (!filePath) {
        throw notFound('export not available');
      }
      res.download(filePath, `${view}.csv`);
    })
  );

  return router;
}
