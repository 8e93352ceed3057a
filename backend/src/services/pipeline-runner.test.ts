import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import type { PipelineConfig } from '../config.js';
import { silentLogger } from '../utils/logger.js';
import { PipelineRunner, runDirectory } from './pipeline-runner.js';

const BATCH = [
  'timestamp,receiving_address,location_region,transaction_type,amount,risk_score',
  '2024-03-01T10:00:00,addr1,north,sale,10,0.5',
  '2024-03-01T11:00:00,addr2,south,sale,20,0.25',
].join('\n');

describe('PipelineRunner', () => {
  let root: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    root = await fsp.mkdtemp(path.join(os.tmpdir(), 'runner-'));
    config = {
      inputPath: path.join(root, 'transactions.csv'),
      thresholds: { preClean: 0.98, postClean: 0.995 },
      dataDir: path.join(root, 'data'),
      curatedDir: path.join(root, 'curated'),
      storage: { driver: 'sqlite', sqlitePath: path.join(root, 'data', 'results.sqlite') },
    };
  });

  afterEach(async () => {
    await fsp.rm(root, { recursive: true, force: true });
  });

  it('queues a run and completes it in the background', async () => {
    await fsp.writeFile(config.inputPath, BATCH, 'utf8');
    const runner = new PipelineRunner(config, silentLogger);

    const queued = runner.enqueue();
    expect(queued.status).toBe('queued');
    expect(queued.thresholds).toEqual({ preClean: 0.98, postClean: 0.995 });

    await runner.idle();
    const run = runner.get(queued.id);
    expect(run?.status).toBe('completed');
    expect(run?.state).toBe('done');
    expect(run?.exitCode).toBe(0);
    expect(run?.cleaning).toEqual({ before: 2, after: 2, removed: 0, timestampUnit: null });
    expect(run?.tables?.stg_transactions).toBe(2);
    expect(run?.profiles.post_clean?.conformity_rate).toBe(1);
    expect(run?.logs.at(-1)?.message).toBe('Pipeline finished successfully.');
    expect(runner.exportPath(queued.id, 'region_risk_avg')).toBe(
      path.join(config.curatedDir, 'runs', queued.id, 'region_risk_avg.csv')
    );
    await expect(
      fsp.access(path.join(config.dataDir, 'runs', queued.id, 'dq_metrics_post_clean.json'))
    ).resolves.toBeUndefined();
  });

  it('keeps the exports of earlier runs apart from later ones', async () => {
    const first = path.join(root, 'first.csv');
    const second = path.join(root, 'second.csv');
    await fsp.writeFile(first, 'timestamp,location_region,transaction_type,amount,risk_score\n1700000000,alpha,sale,1,0.5\n');
    await fsp.writeFile(second, 'timestamp,location_region,transaction_type,amount,risk_score\n1700000000,beta,sale,1,0.75\n');
    const runner = new PipelineRunner(config, silentLogger);

    const runA = runner.enqueue({ inputPath: first });
    const runB = runner.enqueue({ inputPath: second });
    await runner.idle();

    const exportA = runner.exportPath(runA.id, 'region_risk_avg');
    const exportB = runner.exportPath(runB.id, 'region_risk_avg');
    expect(exportA).toBe(path.join(runDirectory(config.curatedDir, runA.id), 'region_risk_avg.csv'));
    expect(exportB).toBe(path.join(runDirectory(config.curatedDir, runB.id), 'region_risk_avg.csv'));
    expect(await fsp.readFile(exportA ?? '', 'utf8')).toBe('location_region,avg_risk_score\nalpha,0.5\n');
    expect(await fsp.readFile(exportB ?? '', 'utf8')).toBe('location_region,avg_risk_score\nbeta,0.75\n');
  });

  it('records a missing input as a failed run', async () => {
    const runner = new PipelineRunner(config, silentLogger);

    const queued = runner.enqueue({ inputPath: path.join(root, 'absent.csv') });
    await runner.idle();

    const run = runner.get(queued.id);
    expect(run?.status).toBe('failed');
    expect(run?.state).toBe('failed_missing_input');
    expect(run?.exitCode).toBe(2);
    expect(run?.error).toBe(`input file not found at ${path.join(root, 'absent.csv')}`);
    expect(runner.exportPath(queued.id, 'region_risk_avg')).toBeNull();
  });

  it('applies per-run threshold overrides', async () => {
    const lines = ['timestamp,transaction_type,amount'];
    for (let index = 0; index < 10; index += 1) {
      lines.push(`${1700000000 + index},sale,${index === 0 ? '' : index}`);
    }
    await fsp.writeFile(config.inputPath, lines.join('\n'), 'utf8');
    const runner = new PipelineRunner(config, silentLogger);

    const strict = runner.enqueue();
    const lenient = runner.enqueue({ thresholds: { preClean: 0.5 } });
    await runner.idle();

    expect(runner.get(strict.id)?.exitCode).toBe(3);
    expect(runner.get(strict.id)?.error).toBe('quality gate rejected: conformity 90.00% below 98.00% (pre_clean)');
    expect(runner.get(lenient.id)?.thresholds).toEqual({ preClean: 0.5, postClean: 0.995 });
    expect(runner.get(lenient.id)?.exitCode).toBe(0);
    expect(runner.get(lenient.id)?.cleaning?.after).toBe(9);
  });

  it('lists runs newest first without logs or profiles', async () => {
    const runner = new PipelineRunner(config, silentLogger);
    const first = runner.enqueue();
    const second = runner.enqueue();
    await runner.idle();

    const runs = runner.list();
    expect(runs.map((run) => run.id)).toEqual([second.id, first.id]);
    expect(runs[0]).not.toHaveProperty('logs');
    expect(runs[0]).not.toHaveProperty('profiles');
  });

  it('returns null for an unknown run', () => {
    const runner = new PipelineRunner(config, silentLogger);
    expect(runner.get('00000000-0000-4000-8000-000000000000')).toBeNull();
  });
});
