import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import type { AppConfig } from './config.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createPipelineRunsRouter } from './routes/pipeline-runs.js';
import type { PipelineRunner } from './services/pipeline-runner.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

export type AppOptions = {
  config: AppConfig;
  runner: PipelineRunner;
  accessLog?: boolean;
};

export function createApp({ config, runner, accessLog = true }: AppOptions): Express {
  const openApiDocument: Record<string, unknown> = YAML.parse(readFileSync(openApiPath, 'utf8'));

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (accessLog) {
    app.use(morgan('combined'));
  }

  app.use('/api/v1/health', createHealthRouter(config.storage));

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/api/v1/pipeline', createPipelineRunsRouter(config, runner));

  app.use(errorHandler);
  return app;
}
