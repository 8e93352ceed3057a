// Runs one batch through the quality-gated pipeline and exits with its outcome:
// 0 published, 2 input missing, 3 rejected by a quality gate, 1 anything else.
import 'dotenv/config';
import path from 'node:path';
import { loadConfig } from '../src/config.js';
import { PipelineError } from '../src/errors.js';
import { exitCodeFor, runPipeline } from '../src/pipeline/controller.js';
import { createConsoleLogger } from '../src/utils/logger.js';

const logger = createConsoleLogger('etl');

async function main(): Promise<number> {
  const config = loadConfig();
  const inputArg = process.argv[2];
  const outcome = await runPipeline({
    config: inputArg ? { ...config, inputPath: path.resolve(inputArg) } : config,
    logger,
  });
  if (outcome.status === 'failed') {
    logger.error(outcome.error.message);
  }
  return exitCodeFor(outcome);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = error instanceof PipelineError ? error.exitCode : 1;
  });
