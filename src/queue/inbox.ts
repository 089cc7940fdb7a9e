/**
 * Spool inbox: request files dropped into `<inbox>/pending` are run one at a
 * time, oldest name first. Each request is moved to `done/` or `failed/` next
 * to a `<name>.result.json` holding the job response.
 */
import * as fs from 'fs';
import * as path from 'path';
import cron from 'node-cron';
import { logger } from '../utils/logger.js';
import type { JobResponse } from '../pipeline/index.js';

export const INBOX_FOLDERS = {
  pending: 'pending',
  done:    'done',
  failed:  'failed',
} as const;

export type JobRunner = (body: unknown) => Promise<JobResponse>;

export interface DrainReport {
  processed: number;
  failed: number;
  /** True when the tick was dropped because the previous one had not finished. */
  skipped: boolean;
}

export class SpoolInbox {
  private running = false;

  constructor(private readonly dir: string, private readonly runJob: JobRunner) {}

  folder(kind: keyof typeof INBOX_FOLDERS): string {
    return path.join(this.dir, INBOX_FOLDERS[kind]);
  }

  ensureLayout(): void {
    for (const folder of Object.values(INBOX_FOLDERS)) {
      fs.mkdirSync(path.join(this.dir, folder), { recursive: true });
    }
  }

  pending(): string[] {
    return fs.readdirSync(this.folder('pending'))
      .filter(f => f.toLowerCase().endsWith('.json'))
      .sort();
  }

  async drain(): Promise<DrainReport> {
    if (this.running) {
      logger.debug('Inbox: previous tick still running, skipping');
      return { processed: 0, failed: 0, skipped: true };
    }
    this.running = true;
    try {
      this.ensureLayout();
      let processed = 0;
      let failed = 0;
      for (const file of this.pending()) {
        const res = await this.process(file);
        processed++;
        if (!res.ok) failed++;
      }
      if (processed > 0) logger.info('Inbox: drained', { processed, failed });
      return { processed, failed, skipped: false };
    } finally {
      this.running = false;
    }
  }

  private async process(file: string): Promise<JobResponse> {
    const source = path.join(this.folder('pending'), file);
    logger.info('Inbox: processing request', { file });

    let res: JobResponse;
    try {
      const body: unknown = JSON.parse(fs.readFileSync(source, 'utf-8'));
      res = await this.runJob(body);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      logger.warn('Inbox: request is not valid JSON', { file, error: err.message });
      res = { ok: false, error: `Request file is not valid JSON: ${err.message}` };
    }

    const dest = this.folder(res.ok ? 'done' : 'failed');
    const stem = path.basename(file, path.extname(file));
    fs.writeFileSync(path.join(dest, `${stem}.result.json`), JSON.stringify(res, null, 2), 'utf-8');
    fs.renameSync(source, path.join(dest, file));
    return res;
  }

  start(schedule: string): cron.ScheduledTask {
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid INBOX_SCHEDULE cron expression: ${schedule}`);
    }
    this.ensureLayout();
    const task = cron.schedule(schedule, async () => {
      await this.drain().catch((err) => {
        logger.error('Cron: inbox drain error', { err });
      });
    });
    logger.info('Inbox: watching', { dir: this.dir, schedule });
    return task;
  }
}
