#!/usr/bin/env node
/**
 * Database connectivity probe.
 *
 * Opens one connection with DATABASE_URL (or DATABASE_POOLER_URL), runs SELECT 1 and closes it.
 *
 * Usage:
 *   npm run build && npm run check-db
 */

import { config } from 'dotenv';

import { checkConnection } from '../src/db.js';
import { errorMessage } from '../src/errors.js';

config();

const connectionString = process.env.DATABASE_POOLER_URL || process.env.DATABASE_URL;

if (!connectionString) {
  console.error('ERROR: DATABASE_URL not found in env! Check .env file and key name.');
  process.exitCode = 1;
} else {
  const isPooler = connectionString.includes('pooler.supabase.com');
  console.log(`Using ${isPooler ? 'POOLER' : 'DIRECT'} connection`);

  checkConnection({ connectionString, ssl: process.env.DATABASE_SSL !== '0' })
    .then(() => {
      console.log('✓ Connection successful');
    })
    .catch((err: unknown) => {
      console.error('Connection failed:', errorMessage(err));
      process.exitCode = 1;
    });
}
