import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { PipelineConfig } from '../config.js';
import {
  exitCodeFor,
  runPipeline,
  type CleaningSummary,
  type PipelineProfiles,
  type PipelineState,
} from '../pipeline/controller.js';
import type { ExportedView } from '../pipeline/publisher.js';
import { createRecordingLogger, type RunLogEntry, type RunLogger } from '../utils/logger.js';

export type PipelineRunStatus = 'queued' | 'running' | 'completed' | 'failed';

export type PipelineRunRequest = {
  inputPath?: string;
  thresholds?: Partial<PipelineConfig['thresholds']>;
  source?: 'configured' | 'upload';
};

export type PipelineRun = {
  id: string;
  status: PipelineRunStatus;
  source: 'configured' | 'upload';
  inputPath: string;
  thresholds: PipelineConfig['thresholds'];
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  state: PipelineState | null;
  exitCode: number | null;
  profiles: PipelineProfiles;
  cleaning: CleaningSummary | null;
  tables: Record<string, number> | null;
  exports: Partial<Record<ExportedView, string>>;
  error: string | null;
  logs: RunLogEntry[];
};

export type PipelineRunSummary = Omit<PipelineRun, 'logs' | 'profiles'>;

export function runDirectory(baseDir: string, runId: string): string {
  return path.join(baseDir, 'runs', runId);
}

/**
 * Queues pipeline runs and executes them one at a time in the background. Runs are
 * kept in memory for the lifetime of the process. Each run writes its profiles and
 * exports under `runs/<id>/` of the configured data and curated directories.
 */
export class PipelineRunner {
  private readonly runs = new Map<string, PipelineRun>();
  private readonly queue: string[] = [];
  private processing: Promise<void> | null = null;

  constructor(
    private readonly config: PipelineConfig,
    private readonly logger: RunLogger
  ) {}

  enqueue(request: PipelineRunRequest = {}): PipelineRun {
    const run: PipelineRun = {
      id: randomUUID(),
      status: 'queued',
      source: request.source ?? 'configured',
      inputPath: request.inputPath ?? this.config.inputPath,
      thresholds: { ...this.config.thresholds, ...request.thresholds },
      createdAt: new Date().toISOString(),
      startedAt: null,
      finishedAt: null,
      state: null,
      exitCode: null,
      profiles: { pre_clean: null, post_clean: null },
      cleaning: null,
      tables: null,
      exports: {},
      error: null,
      logs: [],
    };
    this.runs.set(run.id, run);
    this.queue.push(run.id);
    this.logger.info(`run ${run.id} queued (${run.inputPath})`);
    this.kick();
    return run;
  }

  get(id: string): PipelineRun | null {
    return this.runs.get(id) ?? null;
  }

  list(): PipelineRunSummary[] {
    return Array.from(this.runs.values())
      .reverse()
      .map(({ logs: _logs, profiles: _profiles, ...summary }) => summary);
  }

  exportPath(id: string, view: ExportedView): string | null {
    return this.runs.get(id)?.exports[view] ?? null;
  }

  /** Resolves once every queued run has finished. */
  async idle(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private kick(): void {
    if (this.processing || !this.queue.length) return;
    this.processing = Promise.resolve()
      .then(() => this.processQueue())
      .finally(() => {
        this.processing = null;
        this.kick();
      });
  }

  private async processQueue(): Promise<void> {
    while (this.queue.length) {
      const id = this.queue.shift();
      const run = id ? this.runs.get(id) : undefined;
      if (!run) continue;
      await this.execute(run);
    }
  }

  private async execute(run: PipelineRun): Promise<void> {
    run.status = 'running';
    run.startedAt = new Date().toISOString();
    const logger = createRecordingLogger(run.logs, this.logger);

    try {
      const outcome = await runPipeline({
        config: {
          ...this.config,
          inputPath: run.inputPath,
          thresholds: run.thresholds,
          dataDir: runDirectory(this.config.dataDir, run.id),
          curatedDir: runDirectory(this.config.curatedDir, run.id),
        },
        logger,
        onTransition: (state) => {
          run.state = state;
        },
      });
      run.profiles = outcome.profiles;
      run.exitCode = exitCodeFor(outcome);
      if (outcome.status === 'done' || outcome.state === 'failed_quality_gate') {
        run.cleaning = outcome.cleaning;
        run.tables = outcome.published?.tables ?? null;
        run.exports = outcome.published?.exports ?? {};
      }
      if (outcome.status === 'failed') {
        run.status = 'failed';
        run.error = outcome.error.message;
      } else {
        run.status = 'completed';
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(message);
      run.status = 'failed';
      run.exitCode = 1;
      run.error = message;
    } finally {
      run.finishedAt = new Date().toISOString();
    }
  }
}
