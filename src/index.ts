#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { logger, setLogLevel } from './logger.js';
import { loadEnvConfig } from './config.js';
import { createProgram } from './cli.js';
import { formatError } from './errors.js';
import { streamSession } from './pipeline/session.js';

loadDotenv();

process.title = 'camcast';

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  return z.object({ version: z.string() }).parse(raw).version;
}

async function main() {
  const env = loadEnvConfig();
  setLogLevel(env.CAMCAST_LOG_LEVEL);

  const program = createProgram(env, (config) => streamSession(config), packageVersion());
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  logger.error(`Fatal error: ${formatError(err)}`, { err });
  process.exit(1);
});
