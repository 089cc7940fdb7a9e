#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for the Draft Render Service.
 * Checks configuration, the drafts root and template, ffprobe, the export
 * command, and the optional Supabase ledger and Telegram bot.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, why: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${why})`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkDir(label: string, dirPath: string | undefined, hint: string): boolean {
  if (dirPath && existsSync(dirPath) && statSync(dirPath).isDirectory()) {
    pass(label, dirPath);
    return true;
  }
  fail(label, dirPath ? `${dirPath} is not a directory. ${hint}` : hint);
  anyRequiredFailed = true;
  return false;
}

function checkBinary(label: string, binary: string, args: string[]): boolean {
  try {
    const out = execFileSync(binary, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(label, out.split('\n')[0]?.trim() ?? binary);
    return true;
  } catch (err) {
    fail(label, `Could not run ${binary}: ${err instanceof Error ? err.message : String(err)}`);
    anyRequiredFailed = true;
    return false;
  }
}

// ── Section: Drafts ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Draft Render Service: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Drafts root and templates${RESET}`);

const draftsRoot = process.env['DRAFTS_ROOT'] || undefined;
if (checkDir('DRAFTS_ROOT', draftsRoot, 'Set DRAFTS_ROOT to the editor\'s drafts folder in .env') && draftsRoot) {
  const templates = readdirSync(draftsRoot).filter(f => existsSync(join(draftsRoot, f, 'draft_content.json')));
  if (templates.length > 0) {
    pass('drafts found', `${templates.length} folder(s): ${templates.slice(0, 3).join(', ')}${templates.length > 3 ? '…' : ''}`);
  } else {
    skip('drafts found', 'no folder with a draft_content.json yet: template flows need one');
  }
}

const templatePath = process.env['TEMPLATE_PATH'] || undefined;
if (!templatePath) {
  skip('TEMPLATE_PATH', 'unset: template-replace requests must carry template_path');
} else if (existsSync(templatePath) && statSync(templatePath).isFile()) {
  pass('TEMPLATE_PATH', templatePath);
} else {
  fail('TEMPLATE_PATH', `${templatePath} is not a file`);
  anyRequiredFailed = true;
}

// ── Section: Tools ────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Media tools${RESET}`);

checkBinary('ffprobe', process.env['FFPROBE_PATH'] || 'ffprobe', ['-version']);

const exportCommand = process.env['EXPORT_COMMAND'] || undefined;
if (!exportCommand) {
  skip('EXPORT_COMMAND', 'unset: drafts are persisted but not exported');
} else {
  const [binary] = exportCommand.trim().split(/\s+/);
  if (binary && existsSync(binary)) pass('EXPORT_COMMAND', exportCommand);
  else skip('EXPORT_COMMAND', `${exportCommand}: binary resolved from PATH at run time`);
}

// ── Section: Optional / configuration variables ───────────────────────────────

console.log(`\n${BOLD}[ 3 ] Optional / configuration variables${RESET}`);

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value || defaultVal;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

checkOptional('EXPORT_RESOLUTION', process.env['EXPORT_RESOLUTION'], '1080p');
checkOptional('EXPORT_TIMEOUT_MS', process.env['EXPORT_TIMEOUT_MS'], '1800000');
checkOptional('INBOX_DIR',         process.env['INBOX_DIR'],         '(unset: server mode disabled)');
checkOptional('INBOX_SCHEDULE',    process.env['INBOX_SCHEDULE'],    '* * * * *');
checkOptional('LOG_LEVEL',         process.env['LOG_LEVEL'],         'info');
checkOptional('LOG_FORMAT',        process.env['LOG_FORMAT'],        'text');

// ── Section: Supabase connection ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Supabase job ledger${RESET}`);

const supabaseUrl = process.env['SUPABASE_URL'];
const supabaseKey = process.env['SUPABASE_SERVICE_KEY'];

if (supabaseUrl && supabaseKey) {
  process.stdout.write(`  Testing Supabase connection… `);
  try {
    const sb = createClient(supabaseUrl, supabaseKey, { auth: { persistSession: false } });
    const { error } = await sb.from('render_jobs').select('job_id').limit(1);
    if (error) throw new Error(error.message);
    console.log(`${GREEN}✓${RESET}  connected`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Supabase connection failed', `${err instanceof Error ? err.message : String(err)} (run npm run setup-db?)`);
    anyRequiredFailed = true;
  }
} else {
  skip('Supabase ledger', 'not configured: job ledger disabled');
}

// ── Section: Telegram bot ─────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Telegram bot${RESET}`);

const tgToken  = process.env['TELEGRAM_BOT_TOKEN'];
const tgChatId = process.env['TELEGRAM_CHAT_ID'];

if (tgToken && tgChatId) {
  process.stdout.write(`  Sending Telegram test message… `);
  try {
    const res = await fetch(`https://api.telegram.org/bot${tgToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: tgChatId, text: '[DraftRender] check-env: pre-flight test: OK' }),
    });
    const json: unknown = await res.json();
    const ok = typeof json === 'object' && json !== null && 'ok' in json && json.ok === true;
    if (!ok) throw new Error(`Telegram API returned HTTP ${res.status}`);
    console.log(`${GREEN}✓${RESET}  message sent: check your channel`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Telegram test message failed', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
} else {
  skip('Telegram test', 'not configured: alerts disabled');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run setup-db (optional), then npm start${RESET}\n`);
}
