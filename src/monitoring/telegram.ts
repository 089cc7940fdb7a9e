/**
 * Telegram notifications.
 *
 * All outbound messages are fire-and-forget (errors are logged, not thrown)
 * and silently skipped when TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID are unset.
 */
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

// ── Internal send ─────────────────────────────────────────────────────────────

export const telegramEnabled = (): boolean => Boolean(env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID);

async function send(text: string): Promise<void> {
  if (!telegramEnabled()) return;
  try {
    const res = await fetch(`https://api.telegram.org/bot${env.TELEGRAM_BOT_TOKEN}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: env.TELEGRAM_CHAT_ID,
        text,
        parse_mode: 'HTML',
      }),
    });
    if (!res.ok) {
      logger.warn('Telegram: sendMessage failed', { status: res.status });
    }
  } catch (err) {
    logger.warn('Telegram: unreachable', { error: String(err) });
  }
}

const escapeHtml = (s: string): string =>
  s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

// ── Public API ─────────────────────────────────────────────────────────────────

export async function sendAlert(
  message: string,
  level: 'info' | 'warning' | 'critical' = 'info',
): Promise<void> {
  const prefix: Record<typeof level, string> = {
    info:     'ℹ️',
    warning:  '⚠️',
    critical: '🚨',
  };
  await send(`${prefix[level]} <b>${level.toUpperCase()}</b>\n${escapeHtml(message)}`);
}

export async function sendJobReport(report: {
  jobId: string;
  flow: string;
  ok: boolean;
  outputPath?: string;
  error?: string;
}): Promise<void> {
  const text = report.ok
    ? `🎬 <b>Render job done</b> [${report.flow}]\n\n` +
      `<b>Job:</b> <code>${escapeHtml(report.jobId)}</code>\n` +
      `<b>Output:</b> <code>${escapeHtml(report.outputPath ?? '(not exported)')}</code>`
    : `❌ <b>Render job failed</b> [${report.flow}]\n\n` +
      `<b>Job:</b> <code>${escapeHtml(report.jobId)}</code>\n` +
      `<b>Error:</b> ${escapeHtml(report.error ?? 'unknown')}`;
  await send(text);
}
