#!/usr/bin/env node
/**
 * Draft Render Service: entry point.
 *
 *   run <request.json>   run one job and print its response
 *   drain                process the spool inbox once
 *   server               drain the spool inbox on INBOX_SCHEDULE (default)
 */
import * as fs from 'fs';
import { env } from './config.js';
import { logger } from './utils/logger.js';
import { createDefaultDeps, runJob } from './pipeline/index.js';
import { SpoolInbox } from './queue/inbox.js';
import { sendAlert } from './monitoring/telegram.js';

function inbox(): SpoolInbox {
  if (!env.INBOX_DIR) {
    throw new Error('INBOX_DIR is not set');
  }
  const deps = createDefaultDeps();
  return new SpoolInbox(env.INBOX_DIR, body => runJob(body, deps));
}

async function runFile(file: string | undefined): Promise<void> {
  if (!file) {
    throw new Error('Usage: draft-render run <request.json>');
  }
  const body: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  const res = await runJob(body);
  process.stdout.write(JSON.stringify(res, null, 2) + '\n');
  if (!res.ok) process.exitCode = 1;
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, arg] = process.argv;

async function main(): Promise<void> {
  logger.info('Draft Render Service: starting', { command: command ?? 'server' });

  switch (command) {
    case 'run':
      await runFile(arg);
      break;

    case 'drain': {
      const report = await inbox().drain();
      if (report.failed > 0) process.exitCode = 1;
      break;
    }

    case undefined:
    case 'server':
      inbox().start(env.INBOX_SCHEDULE);
      await sendAlert('Draft Render Service started.', 'info');
      logger.info('Draft Render Service: server mode running');
      break;

    default:
      throw new Error(`Unknown command "${command}" (expected run, drain or server)`);
  }
}

main().catch((err) => {
  logger.error('Fatal startup error', { err });
  process.exit(1);
});
