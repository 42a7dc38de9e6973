/**
 * Weather ETL entry points
 *
 * Purpose:
 * - Scheduled job that fetches the current weather for one city and stores one row in Postgres.
 * - `handler` is what a scheduler invokes (cron trigger, container job); it never throws.
 * - `main` is the CLI used for local runs and by the container image.
 *
 * Environment:
 *   Requires OPENWEATHER_API_KEY and DATABASE_URL (see src/config.ts for the rest).
 */

import { pathToFileURL } from 'node:url';

import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { runOnce, type PipelineDeps } from './pipeline.js';

export interface HandlerResult {
  statusCode: 200 | 500;
  body: string;
}

/** Circular or BigInt-carrying events cannot be serialized; log a placeholder instead. */
function describeEvent(event: unknown): string {
  try {
    return JSON.stringify(event ?? null, null, 2);
  } catch (err) {
    return `[unserializable event: ${errorMessage(err)}]`;
  }
}

export async function handler(
  event: unknown,
  env: Record<string, string | undefined> = process.env,
  deps: PipelineDeps = {}
): Promise<HandlerResult> {
  const logger = deps.logger ?? console;

  try {
    logger.log('=== Weather ETL Started ===');
    logger.log('Event:', describeEvent(event));
    logger.log('Timestamp:', new Date().toISOString());

    const config = loadConfig(env);
    const result = await runOnce(config, deps);

    logger.log('\n=== Weather ETL Completed Successfully ===');
    return {
      statusCode: 200,
      body: JSON.stringify({
        message: result.dryRun
          ? 'Dry run, nothing written'
          : result.inserted
            ? 'Observation stored'
            : 'Observation already stored for this date',
        city: result.observation.city,
        inserted: result.inserted,
        timestamp: new Date().toISOString(),
      }),
    };
  } catch (error) {
    logger.error('\n=== Weather ETL Failed ===');
    logger.error('Error:', error);

    return {
      statusCode: 500,
      body: JSON.stringify({
        message: 'Weather ETL run failed',
        error: errorMessage(error),
        errorType: error instanceof Error ? error.name : 'Error',
        timestamp: new Date().toISOString(),
      }),
    };
  }
}

const HELP = `
Weather ETL - run once

Usage: node dist/src/index.js [options]

Options:
  -d, --dry-run           Extract and transform only, skip the database write
  -h, --help              Show this help message

Environment (or .env):
  OPENWEATHER_API_KEY     API key for the weather API (required)
  DATABASE_URL            Postgres connection string (required unless --dry-run)
  WEATHER_CITY            City query, default "Bournemouth,GB"
`;

/**
 * Returns the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const flags = {
    dryRun: argv.includes('--dry-run') || argv.includes('-d'),
    help: argv.includes('--help') || argv.includes('-h'),
  };

  if (flags.help) {
    console.log(HELP);
    return 0;
  }

  // Load .env file for local runs; real deployments inject the environment
  const { config } = await import('dotenv');
  const loaded = config();
  if (loaded.error) {
    console.log('Note: no .env file loaded, using process environment\n');
  } else {
    console.log('✓ Loaded environment variables from .env\n');
  }

  if (flags.dryRun) {
    console.log('⚠️  DRY-RUN mode enabled via --dry-run flag');
    console.log('    Weather will be fetched and transformed, but NOT written to database\n');
    process.env.DRY_RUN = '1';
  }

  const result = await handler({ source: 'cli', time: new Date().toISOString() });

  console.log('\n--- Result ---');
  console.log('Status Code:', result.statusCode);
  console.log('Body:', result.body);

  return result.statusCode === 200 ? 0 : 1;
}

// Run main if this file is executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
