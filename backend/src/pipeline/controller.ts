import type { PipelineConfig } from '../config.js';
import { InputNotFoundError, QualityGateRejectedError } from '../errors.js';
import type { RunLogger } from '../utils/logger.js';
import { readDataset } from './csv-io.js';
import { discardProfile, profileDataset } from './profiler.js';
import { publishRawSnapshot, publishViews, type PublishSummary } from './publisher.js';
import { evaluateGate } from './quality-gate.js';
import { standardize, type StandardizeResult } from './standardizer.js';
import { toDataset, type Dataset, type DQProfile } from './types.js';

export type PipelineState =
  | 'ingesting'
  | 'profiling_pre'
  | 'gating_pre'
  | 'standardizing'
  | 'profiling_post'
  | 'gating_post'
  | 'publishing'
  | 'done'
  | 'failed_missing_input'
  | 'failed_quality_gate';

export type PipelineProfiles = {
  pre_clean: DQProfile | null;
  post_clean: DQProfile | null;
};

export type CleaningSummary = Omit<StandardizeResult, 'records'>;

export type PipelineOutcome =
  | {
      status: 'done';
      state: 'done';
      profiles: PipelineProfiles;
      cleaning: CleaningSummary;
      published: PublishSummary;
    }
  | {
      status: 'failed';
      state: 'failed_missing_input';
      error: InputNotFoundError;
      profiles: PipelineProfiles;
    }
  | {
      status: 'failed';
      state: 'failed_quality_gate';
      error: QualityGateRejectedError;
      profiles: PipelineProfiles;
      cleaning: CleaningSummary | null;
      published: PublishSummary | null;
      rawSnapshotRows: number | null;
    };

export type PipelineRunOptions = {
  config: PipelineConfig;
  logger: RunLogger;
  onTransition?: (state: PipelineState) => void;
};

function summarize({ records: _records, ...summary }: StandardizeResult): CleaningSummary {
  return summary;
}

/**
 * Runs one batch: ingest, profile and gate the raw rows, standardize, profile and gate
 * again, then publish. A rejected gate performs its phase's partial publish before the
 * run ends. Storage and filesystem failures are thrown as-is.
 */
export async function runPipeline({ config, logger, onTransition }: PipelineRunOptions): Promise<PipelineOutcome> {
  const enter = (state: PipelineState) => {
    logger.info(`-> ${state}`);
    onTransition?.(state);
  };
  const profiles: PipelineProfiles = { pre_clean: null, post_clean: null };
  const profilerDeps = { dataDir: config.dataDir, logger };
  const publisherDeps = { config, logger };

  enter('ingesting');
  logger.info(`Reading local CSV: ${config.inputPath}`);
  let raw: Dataset;
  try {
    raw = await readDataset(config.inputPath, logger);
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      logger.error(`File not found at ${config.inputPath}. Place the CSV there or set INPUT_CSV.`);
      enter('failed_missing_input');
      return { status: 'failed', state: 'failed_missing_input', error, profiles };
    }
    throw error;
  }
  logger.info(`Rows read: ${raw.rows.length} | Columns: ${raw.columns.join(', ')}`);

  enter('profiling_pre');
  profiles.pre_clean = await profileDataset(raw, 'pre_clean', profilerDeps);

  enter('gating_pre');
  const preGate = evaluateGate(profiles.pre_clean, config.thresholds.preClean);
  if (preGate.kind === 'reject') {
    logger.error(`Pre-clean gate rejected the batch: ${preGate.reason}`);
    const rawSnapshotRows = await publishRawSnapshot(raw, publisherDeps);
    await discardProfile(config.dataDir, 'post_clean');
    enter('failed_quality_gate');
    return {
      status: 'failed',
      state: 'failed_quality_gate',
      error: new QualityGateRejectedError(preGate.phase, preGate.observedRate, preGate.threshold, preGate.reason),
      profiles,
      cleaning: null,
      published: null,
      rawSnapshotRows,
    };
  }

  enter('standardizing');
  const cleaned = standardize(raw, logger);

  enter('profiling_post');
  profiles.post_clean = await profileDataset(toDataset(cleaned.records), 'post_clean', profilerDeps);

  enter('gating_post');
  const postGate = evaluateGate(profiles.post_clean, config.thresholds.postClean);
  if (postGate.kind === 'reject') {
    logger.error(`Post-clean gate rejected the batch: ${postGate.reason}; publishing for inspection`);
    const published = await publishViews(cleaned.records, publisherDeps);
    enter('failed_quality_gate');
    return {
      status: 'failed',
      state: 'failed_quality_gate',
      error: new QualityGateRejectedError(postGate.phase, postGate.observedRate, postGate.threshold, postGate.reason),
      profiles,
      cleaning: summarize(cleaned),
      published,
      rawSnapshotRows: null,
    };
  }

  enter('publishing');
  const published = await publishViews(cleaned.records, publisherDeps);

  enter('done');
  logger.info('Pipeline finished successfully.');
  return { status: 'done', state: 'done', profiles, cleaning: summarize(cleaned), published };
}

export function exitCodeFor(outcome: PipelineOutcome): number {
  return outcome.status === 'done' ? 0 : outcome.error.exitCode;
}
