#!/usr/bin/env node
/**
 * bulk-bridge executable. Loads `.env` (or `SF_ENV_FILE`) before reading configuration.
 */

import { config as loadEnv } from 'dotenv';
import { createConsoleObservability, parseLogLevel } from '../observability/index.js';
import { runCli } from './index.js';

loadEnv({ path: process.env.SF_ENV_FILE ?? '.env' });

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  observability: createConsoleObservability(parseLogLevel(process.env.LOG_LEVEL)),
});
