import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// Blank lines in .env (`KEY=`) mean "unset", not "empty string"
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(v => (v === '' ? undefined : v), schema.optional());

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Drafts
  DRAFTS_ROOT:          optional(z.string()),
  TEMPLATE_PATH:        optional(z.string()),

  // Media probing
  FFPROBE_PATH:         z.string().min(1).default('ffprobe'),

  // Export
  EXPORT_COMMAND:       optional(z.string()),
  EXPORT_RESOLUTION:    z.enum(['480p', '720p', '1080p', '2k', '4k']).default('1080p'),
  EXPORT_TIMEOUT_MS:    z.coerce.number().int().positive().default(1_800_000),

  // Spool inbox
  INBOX_DIR:            optional(z.string()),
  INBOX_SCHEDULE:       z.string().min(1).default('* * * * *'),

  // Job ledger
  SUPABASE_URL:         optional(z.string().url()),
  SUPABASE_SERVICE_KEY: optional(z.string()),

  // Notifications
  TELEGRAM_BOT_TOKEN:   optional(z.string()),
  TELEGRAM_CHAT_ID:     optional(z.string()),

  // Logging
  LOG_LEVEL:            z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:           z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

export type ExportResolution = typeof env.EXPORT_RESOLUTION;

// ── Time Base ─────────────────────────────────────────────────────────────────
// All offsets and durations are integer microseconds.

export const SEC = 1_000_000;

// ── Draft Files ───────────────────────────────────────────────────────────────

export const DRAFT_FILES = {
  content:  'draft_content.json',
  meta:     'draft_meta_info.json',
} as const;

// Characters Windows refuses in folder names; drafts are folders.
export const INVALID_DRAFT_NAME_CHARS = '<>:"/\\|?*';

// ── Export ────────────────────────────────────────────────────────────────────

export const SUPPORTED_EXPORT_FPS = [24, 25, 30, 50, 60] as const;

export type ExportFps = typeof SUPPORTED_EXPORT_FPS[number];

export const OUTPUT_EXTENSION = '.mp4';

// ── Track Names ───────────────────────────────────────────────────────────────

export const TRACK_NAMES = {
  concat: 'video_main',
  fill:   'video_fill',
} as const;
