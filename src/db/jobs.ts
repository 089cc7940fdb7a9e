/**
 * Render job ledger: one `render_jobs` row per job id, upserted as the job
 * moves through its stages. Writes never fail a job; errors are logged.
 */
import type { SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../utils/logger.js';
import { getSupabase } from './client.js';

export type JobStatus = 'started' | 'persisted' | 'exported' | 'failed';

export interface JobLedgerEntry {
  jobId: string;
  flow: string;
  status: JobStatus;
  draftName?: string;
  outputPath?: string;
  durationUs?: number;
  error?: string;
}

export interface JobLedger {
  record(entry: JobLedgerEntry): Promise<void>;
}

export const JOBS_TABLE = 'render_jobs';

export class SupabaseJobLedger implements JobLedger {
  constructor(private readonly client: SupabaseClient) {}

  async record(entry: JobLedgerEntry): Promise<void> {
    const row = {
      job_id:      entry.jobId,
      flow:        entry.flow,
      status:      entry.status,
      draft_name:  entry.draftName ?? null,
      output_path: entry.outputPath ?? null,
      duration_us: entry.durationUs ?? null,
      error:       entry.error ?? null,
      updated_at:  new Date().toISOString(),
    };
    try {
      const { error } = await this.client.from(JOBS_TABLE).upsert(row, { onConflict: 'job_id' });
      if (error) throw new Error(error.message);
    } catch (err) {
      logger.warn('JobLedger: write failed', { jobId: entry.jobId, status: entry.status, error: String(err) });
    }
  }
}

export const noopLedger: JobLedger = {
  record: async () => undefined,
};

export function createJobLedger(): JobLedger {
  const client = getSupabase();
  return client ? new SupabaseJobLedger(client) : noopLedger;
}
