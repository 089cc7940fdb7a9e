#!/usr/bin/env tsx
/**
 * Creates the render job ledger in Supabase.
 * Run: npm run setup-db
 *
 * Each migrations/*.sql file is sent through the project's `exec_sql(sql text)`
 * RPC together with its `_migrations` bookkeeping row, so a file is either
 * applied and recorded or neither. Finishes by reading one row of render_jobs.
 *
 * Exit codes:
 *   0: ledger table reachable
 *   1: a migration failed or the table is still missing
 */
import { createClient } from '@supabase/supabase-js';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

const GREEN = '\x1b[32m';
const RED   = '\x1b[31m';
const DIM   = '\x1b[2m';
const RESET = '\x1b[0m';

const url = process.env['SUPABASE_URL'];
const key = process.env['SUPABASE_SERVICE_KEY'];
if (!url || !key) {
  console.error(`${RED}SUPABASE_URL and SUPABASE_SERVICE_KEY must be set; the ledger is optional otherwise.${RESET}`);
  process.exit(1);
}

const sb = createClient(url, key, { auth: { persistSession: false } });
const migrationsDir = fileURLToPath(new URL('../migrations', import.meta.url));

async function execSql(sql: string): Promise<void> {
  const { error } = await sb.rpc('exec_sql', { sql });
  if (error) throw new Error(error.message);
}

await execSql('CREATE TABLE IF NOT EXISTS _migrations (name TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW());');

const { data: rows, error: listError } = await sb.from('_migrations').select('name');
if (listError) {
  console.error(`${RED}Could not read _migrations: ${listError.message}${RESET}`);
  process.exit(1);
}
const applied = new Set((rows ?? []).map((r: { name: string }) => r.name));

let failed = false;
for (const file of readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort()) {
  if (applied.has(file)) {
    console.log(`${DIM}  ${file} already applied${RESET}`);
    continue;
  }
  const sql = readFileSync(join(migrationsDir, file), 'utf-8');
  const name = file.replace(/'/g, "''");
  try {
    await execSql(`BEGIN;\n${sql}\nINSERT INTO _migrations (name) VALUES ('${name}');\nCOMMIT;`);
    console.log(`${GREEN}✓ ${file}${RESET}`);
  } catch (err) {
    console.error(`${RED}✗ ${file}: ${err instanceof Error ? err.message : String(err)}${RESET}`);
    failed = true;
  }
}

const { error: probeError } = await sb.from('render_jobs').select('job_id').limit(1);
if (failed || probeError) {
  if (probeError) console.error(`${RED}render_jobs is not reachable: ${probeError.message}${RESET}`);
  process.exit(1);
}
console.log(`${GREEN}render_jobs ledger ready.${RESET}`);
