import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { promises as fsp } from 'node:fs';
import { z } from 'zod';
import { createApp } from './app.js';
import type { AppConfig } from './config.js';
import { PipelineRunner } from './services/pipeline-runner.js';
import { silentLogger } from './utils/logger.js';

const acceptedSchema = z.object({ runId: z.string().uuid(), inputPath: z.string() });

const BATCH = [
  'timestamp,receiving_address,location_region,transaction_type,amount,risk_score',
  '2024-03-01T10:00:00,addr1,north,sale,10,0.5',
  '2024-03-01T11:00:00,addr2,south,sale,20,0.25',
].join('\n');

describe('pipeline API', () => {
  let root: string;
  let runner: PipelineRunner;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    root = await fsp.mkdtemp(path.join(os.tmpdir(), 'api-'));
    const config: AppConfig = {
      inputPath: path.join(root, 'missing.csv'),
      thresholds: { preClean: 0.98, postClean: 0.995 },
      dataDir: path.join(root, 'data'),
      curatedDir: path.join(root, 'curated'),
      storage: { driver: 'sqlite', sqlitePath: path.join(root, 'data', 'results.sqlite') },
      uploadDir: path.join(root, 'uploads'),
      uploadMaxFileSize: 1024 * 1024,
      apiPort: 0,
    };
    runner = new PipelineRunner(config, silentLogger);
    server = createApp({ config, runner, accessLog: false }).listen(0);
    await once(server, 'listening');
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/api/v1`;
  });

  afterEach(async () => {
    await runner.idle();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await fsp.rm(root, { recursive: true, force: true });
  });

  function uploadForm(filename: string, fields: Record<string, string> = {}): FormData {
    const form = new FormData();
    form.append('file', new Blob([BATCH], { type: 'text/csv' }), filename);
    for (const [key, value] of Object.entries(fields)) {
      form.append(key, value);
    }
    return form;
  }

  it('reports health with the storage driver', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body).toMatchObject({ status: 'ok', storage: 'sqlite' });
  });

  it('runs an uploaded batch and serves its exports', async () => {
    const response = await fetch(`${baseUrl}/pipeline/runs`, {
      method: 'POST',
      body: uploadForm('batch.csv', { preCleanThreshold: '0.9' }),
    });
    expect(response.status).toBe(202);
    const body = await response.json();
    expect(body).toMatchObject({ status: 'queued', thresholds: { preClean: 0.9, postClean: 0.995 } });
    const accepted = acceptedSchema.parse(body);
    expect(path.basename(accepted.inputPath)).toBe('batch.csv');

    await runner.idle();

    const status = await fetch(`${baseUrl}/pipeline/runs/${accepted.runId}/status`);
    const run = await status.json();
    expect(run).toMatchObject({ id: accepted.runId, status: 'completed', source: 'upload', exitCode: 0 });
    expect(run).not.toHaveProperty('profiles');

    const profiles = await (await fetch(`${baseUrl}/pipeline/runs/${accepted.runId}/profiles`)).json();
    expect(profiles).toMatchObject({
      pre_clean: { phase: 'pre_clean', total_rows: 2, failed_rows_estimate: 0 },
      post_clean: { phase: 'post_clean', total_rows: 2 },
    });

    const download = await fetch(`${baseUrl}/pipeline/runs/${accepted.runId}/exports/region_risk_avg`);
    expect(download.status).toBe(200);
    expect(await download.text()).toBe('location_region,avg_risk_score\nnorth,0.5\nsouth,0.25\n');

    const listed = await (await fetch(`${baseUrl}/pipeline/runs`)).json();
    expect(listed).toMatchObject({ runs: [{ id: accepted.runId }] });
  });

  it('records a failed run when the configured input is missing', async () => {
    const response = await fetch(`${baseUrl}/pipeline/runs`, { method: 'POST' });
    expect(response.status).toBe(202);
    const { runId } = acceptedSchema.parse(await response.json());

    await runner.idle();

    const run = await (await fetch(`${baseUrl}/pipeline/runs/${runId}/status`)).json();
    expect(run).toMatchObject({ status: 'failed', state: 'failed_missing_input', exitCode: 2 });

    const download = await fetch(`${baseUrl}/pipeline/runs/${runId}/exports/top3_recent_sales_by_receiving`);
    expect(download.status).toBe(404);
    expect(await download.json()).toEqual({ message: 'export not available' });
  });

  it('rejects uploads that are not CSV', async () => {
    const response = await fetch(`${baseUrl}/pipeline/runs`, { method: 'POST', body: uploadForm('batch.txt') });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ message: 'unsupported file type: batch.txt' });
    expect(runner.list()).toEqual([]);
  });

  it('rejects thresholds outside [0, 1]', async () => {
    const response = await fetch(`${baseUrl}/pipeline/runs`, {
      method: 'POST',
      body: uploadForm('batch.csv', { postCleanThreshold: '2' }),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ message: 'invalid request' });
  });

  it('returns 404 for an unknown run and 400 for a malformed id', async () => {
    const unknown = await fetch(`${baseUrl}/pipeline/runs/00000000-0000-4000-8000-000000000000/status`);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ message: 'pipeline run not found' });

    const malformed = await fetch(`${baseUrl}/pipeline/runs/not-a-uuid/status`);
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ message: 'validation_failed' });
  });
});
