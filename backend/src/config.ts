import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_THRESHOLDS } from './pipeline/quality-gate.js';

export type PostgresConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type StorageConfig =
  | { driver: 'sqlite'; sqlitePath: string }
  | { driver: 'postgres'; postgres: PostgresConfig };

export type PipelineConfig = {
  inputPath: string;
  thresholds: {
    preClean: number;
    postClean: number;
  };
  dataDir: string;
  curatedDir: string;
  storage: StorageConfig;
};

export type AppConfig = PipelineConfig & {
  uploadDir: string;
  uploadMaxFileSize: number;
  apiPort: number;
};

const threshold = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  INPUT_CSV: z.string().trim().min(1).default('./input/transactions.csv'),
  DQ_PRE_CLEAN_THRESHOLD: threshold.default(DEFAULT_THRESHOLDS.pre_clean),
  DQ_POST_CLEAN_THRESHOLD: threshold.default(DEFAULT_THRESHOLDS.post_clean),
  DATA_DIR: z.string().trim().min(1).default('./data'),
  CURATED_DIR: z.string().trim().min(1).default('./curated'),
  UPLOAD_DIR: z.string().trim().min(1).default('./uploads'),
  UPLOAD_MAX_FILE_SIZE: z.coerce.number().int().positive().default(1024 * 1024 * 200),
  STORAGE_DRIVER: z.enum(['sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().trim().min(1).optional(),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().default('etl'),
  POSTGRES_PASSWORD: z.string().default('etlpass'),
  POSTGRES_DB: z.string().default('etldb'),
  API_PORT: z.coerce.number().int().min(0).default(8080),
});

// Empty variables fall back to their defaults.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const vars = parsed.data;
  const dataDir = path.resolve(cwd, vars.DATA_DIR);

  const storage: StorageConfig =
    vars.STORAGE_DRIVER === 'postgres'
      ? {
          driver: 'postgres',
          postgres: {
            host: vars.POSTGRES_HOST,
            port: vars.POSTGRES_PORT,
            user: vars.POSTGRES_USER,
            password: vars.POSTGRES_PASSWORD,
            database: vars.POSTGRES_DB,
          },
        }
      : {
          driver: 'sqlite',
          sqlitePath: vars.SQLITE_PATH ? path.resolve(cwd, vars.SQLITE_PATH) : path.join(dataDir, 'results.sqlite'),
        };

  return {
    inputPath: path.resolve(cwd, vars.INPUT_CSV),
    thresholds: {
      preClean: vars.DQ_PRE_CLEAN_THRESHOLD,
      postClean: vars.DQ_POST_CLEAN_THRESHOLD,
    },
    dataDir,
    curatedDir: path.resolve(cwd, vars.CURATED_DIR),
    storage,
    uploadDir: path.resolve(cwd, vars.UPLOAD_DIR),
    uploadMaxFileSize: vars.UPLOAD_MAX_FILE_SIZE,
    apiPort: vars.API_PORT,
  };
}
