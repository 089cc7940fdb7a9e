/**
 * Job flows: concat, template-replace, template-fill.
 *
 * Every flow runs the same shape: validate inputs → obtain a draft → mutate →
 * garbage-collect → persist → export. Nothing is persisted until all mutation
 * has succeeded, and export only ever follows a successful save.
 *
 * runJob is the boundary: it turns JobError into { ok: false, error } and
 * hides the detail of anything else behind "Internal error".
 */
import { env, TRACK_NAMES, type ExportFps } from '../config.js';
import { logger } from '../utils/logger.js';
import { isJobError } from '../utils/errors.js';
import { ensureDraftsRoot, TemplateStore } from '../draft/store.js';
import type { Draft } from '../draft/model.js';
import { unitsToSeconds } from '../draft/timerange.js';
import { assertAssetFile, CachedResolver, FfprobeDurationResolver, type DurationResolver } from '../media/probe.js';
import { assertExportFps, createExporter, prepareOutputPath, validateOutputPath, type Exporter } from '../export/exporter.js';
import { buildTimeline } from '../timeline/builder.js';
import { readOriginalDurations, replaceSegments, selectVideoTrack, validateReplacements } from '../timeline/replacer.js';
import { fillTemplate } from '../timeline/filler.js';
import { collectOrphans } from '../timeline/gc.js';
import { createJobLedger, type JobLedger } from '../db/jobs.js';
import { sendJobReport } from '../monitoring/telegram.js';
import {
  draftsRootOf,
  parseJobRequest,
  type ConcatRequest,
  type JobRequest,
  type TemplateFillRequest,
  type TemplateReplaceRequest,
} from './requests.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PipelineDeps {
  store: TemplateStore;
  resolver: DurationResolver;
  /** Absent when no export command is configured; drafts are still persisted. */
  exporter?: Exporter;
  ledger: JobLedger;
}

export interface JobResult {
  draftName: string;
  draftDir: string;
  outputPath: string;
  /** Microseconds. */
  duration: number;
  exported: boolean;
}

export type JobResponse =
  | { ok: true; job_id: string; draft_name: string; output_path: string; exported: boolean }
  | { ok: false; job_id?: string; error: string };

interface Prepared {
  root: string;
  fps: ExportFps;
  outputPath: string;
}

export function createDefaultDeps(): PipelineDeps {
  return {
    store: new TemplateStore({ defaultTemplatePath: env.TEMPLATE_PATH }),
    resolver: new FfprobeDurationResolver(),
    exporter: createExporter(),
    ledger: createJobLedger(),
  };
}

// ── Shared steps ──────────────────────────────────────────────────────────────

/** Input checks that must pass before any draft is touched. */
function prepare(request: JobRequest, assetPaths: readonly string[]): Prepared & { assets: string[] } {
  const root = ensureDraftsRoot(draftsRootOf(request));
  const fps = assertExportFps(request.fps);
  const outputPath = validateOutputPath(request.output_path);
  const assets = assetPaths.map(assertAssetFile);
  return { root, fps, outputPath, assets };
}

async function finish(draft: Draft, request: JobRequest, prepared: Prepared, deps: PipelineDeps): Promise<JobResult> {
  collectOrphans(draft);
  deps.store.save(draft);
  await deps.ledger.record({
    jobId: request.job_id,
    flow: request.flow,
    status: 'persisted',
    draftName: draft.name,
    durationUs: draft.duration,
  });

  const result: JobResult = {
    draftName: draft.name,
    draftDir: draft.dir,
    outputPath: prepared.outputPath,
    duration: draft.duration,
    exported: false,
  };

  if (!deps.exporter) {
    logger.warn('Pipeline: no exporter configured, draft persisted without export', { draft: draft.name });
    return result;
  }

  prepareOutputPath(prepared.outputPath);
  await deps.exporter.export(draft.name, prepared.outputPath, prepared.fps);
  await deps.ledger.record({
    jobId: request.job_id,
    flow: request.flow,
    status: 'exported',
    draftName: draft.name,
    outputPath: prepared.outputPath,
    durationUs: draft.duration,
  });
  return { ...result, exported: true };
}

// ── Flows ─────────────────────────────────────────────────────────────────────

export async function concatVideos(request: ConcatRequest, deps: PipelineDeps): Promise<JobResult> {
  const prepared = prepare(request, request.videos);

  const draft = deps.store.createDraft(prepared.root, request.job_id, request.canvas, request.fps);
  const track = draft.addTrack('video', TRACK_NAMES.concat);
  const total = buildTimeline(draft, track.name, prepared.assets, deps.resolver, {
    capSeconds: request.options?.max_each_video_seconds,
  });
  logger.info('Pipeline: concat timeline ready', { jobId: request.job_id, totalSeconds: unitsToSeconds(total) });

  return finish(draft, request, prepared, deps);
}

export async function templateReplace(request: TemplateReplaceRequest, deps: PipelineDeps): Promise<JobResult> {
  const prepared = prepare(request, request.replacements.map(r => r.path));
  const durations = readOriginalDurations(
    request.template_path ?? deps.store.defaultTemplatePath,
    request.video_track_index,
  );

  const replacements = request.replacements.map((r, i) => ({
    segmentIndex: r.segment_index,
    path: prepared.assets[i] ?? r.path,
  }));
  // reject before the template is copied
  validateReplacements(replacements, durations, durations.size, 'template video track');
  const resolver = new CachedResolver(deps.resolver);
  for (const r of replacements) resolver.resolve(r.path);

  const draft = materialize(request, prepared.root, deps.store);
  const track = selectVideoTrack(draft, request.video_track_index);
  const report = replaceSegments(draft, track, durations, replacements, resolver);
  logger.info('Pipeline: template segments replaced', { jobId: request.job_id, removed: report.removed });

  return finish(draft, request, prepared, deps);
}

export async function templateFill(request: TemplateFillRequest, deps: PipelineDeps): Promise<JobResult> {
  const prepared = prepare(request, request.assets);

  const draft = materialize(request, prepared.root, deps.store);
  const slots = draft.tracksOfType('video')[request.video_track_index]?.length ?? 0;
  const total = fillTemplate(draft, prepared.assets, request.fill_strategy, slots, deps.resolver);
  logger.info('Pipeline: template filled', {
    jobId: request.job_id,
    strategy: request.fill_strategy,
    slots,
    totalSeconds: unitsToSeconds(total),
  });

  return finish(draft, request, prepared, deps);
}

function materialize(request: TemplateReplaceRequest | TemplateFillRequest, root: string, store: TemplateStore): Draft {
  return request.template_path
    ? store.resolveByPath(root, request.template_path, request.job_id)
    : store.resolveByName(root, request.template_name, request.job_id);
}

export function runFlow(request: JobRequest, deps: PipelineDeps): Promise<JobResult> {
  switch (request.flow) {
    case 'concat':           return concatVideos(request, deps);
    case 'template-replace': return templateReplace(request, deps);
    case 'template-fill':    return templateFill(request, deps);
  }
}

// ── Boundary ──────────────────────────────────────────────────────────────────

export async function runJob(body: unknown, deps: PipelineDeps = createDefaultDeps()): Promise<JobResponse> {
  let request: JobRequest;
  try {
    request = parseJobRequest(body);
  } catch (err) {
    if (!isJobError(err)) throw err;
    logger.warn('Pipeline: request rejected', { error: err.message });
    return { ok: false, error: err.message };
  }

  const { job_id: jobId, flow } = request;
  logger.info('Pipeline: job started', { jobId, flow });
  await deps.ledger.record({ jobId, flow, status: 'started' });

  try {
    const result = await runFlow(request, deps);
    logger.info('Pipeline: job complete', { jobId, flow, ...result });
    await sendJobReport({ jobId, flow, ok: true, outputPath: result.exported ? result.outputPath : undefined });
    return {
      ok: true,
      job_id: jobId,
      draft_name: result.draftName,
      output_path: result.outputPath,
      exported: result.exported,
    };
  } catch (err) {
    const error = isJobError(err) ? err.message : 'Internal error';
    if (isJobError(err)) {
      logger.warn('Pipeline: job failed', { jobId, flow, code: err.code, error: err.message });
    } else {
      logger.error('Pipeline: unexpected failure', { jobId, flow, err, stack: err instanceof Error ? err.stack : undefined });
    }
    await deps.ledger.record({ jobId, flow, status: 'failed', error });
    await sendJobReport({ jobId, flow, ok: false, error });
    return { ok: false, job_id: jobId, error };
  }
}
