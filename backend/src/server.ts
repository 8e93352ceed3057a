import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { PipelineRunner } from './services/pipeline-runner.js';
import { createConsoleLogger } from './utils/logger.js';

const config = loadConfig();
const runner = new PipelineRunner(config, createConsoleLogger('etl'));
const app = createApp({ config, runner });

app.listen(config.apiPort, () => {
  console.log(`[api] up on :${config.apiPort}`);
});
