/**
 * Test fixtures: temp folders, template descriptions and in-memory fakes for
 * the resolver, exporter and job ledger.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach } from 'vitest';
import { DRAFT_FILES, SEC, type ExportFps } from '../config.js';
import { Draft } from '../draft/model.js';
import { parseContent } from '../draft/content.js';
import { secondsToUnits } from '../draft/timerange.js';
import { JobError, isJobError } from '../utils/errors.js';
import type { DurationResolver, ProbedAsset } from '../media/probe.js';
import type { Exporter } from '../export/exporter.js';
import type { JobLedger, JobLedgerEntry } from '../db/jobs.js';

// ── Temp dirs ─────────────────────────────────────────────────────────────────

const created: string[] = [];

afterEach(() => {
  for (const dir of created.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

export function tmpDir(prefix = 'draft-render-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  created.push(dir);
  return dir;
}

/** Writes an empty placeholder media file and returns its absolute path. */
export function writeAsset(dir: string, name: string): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, '');
  return file;
}

export function readJsonFile(file: string): Record<string, unknown> {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) throw new Error(`${file} is not an object`);
  return Object.fromEntries(Object.entries(raw));
}

// ── Errors ────────────────────────────────────────────────────────────────────

export function catchJobError(fn: () => unknown): JobError {
  try {
    fn();
  } catch (err) {
    if (isJobError(err)) return err;
    throw err;
  }
  throw new Error('Expected a JobError to be thrown');
}

// ── Templates ─────────────────────────────────────────────────────────────────

export const TEMPLATE_MATERIAL_ID = 'MAT-TEMPLATE';

export interface TemplateSpec {
  /** Per video track, contiguous segment durations in seconds. */
  videoTracks: number[][];
  /** File every template segment points at. */
  materialPath: string;
  /** Prepend a text track with one caption segment. */
  withText?: boolean;
}

export function templateContent(spec: TemplateSpec): Record<string, unknown> {
  const tracks: unknown[] = [];
  if (spec.withText) {
    tracks.push({
      id: 'TRACK-TEXT',
      type: 'text',
      name: 'captions',
      segments: [{ id: 'SEG-TEXT', material_id: 'TXT-1', target_timerange: { start: 0, duration: SEC } }],
    });
  }
  spec.videoTracks.forEach((durations, t) => {
    let cursor = 0;
    tracks.push({
      id: `TRACK-V${t}`,
      type: 'video',
      name: `v${t}`,
      segments: durations.map((seconds, i) => {
        const duration = secondsToUnits(seconds);
        const seg = {
          id: `SEG-${t}-${i}`,
          material_id: TEMPLATE_MATERIAL_ID,
          source_timerange: { start: 0, duration },
          target_timerange: { start: cursor, duration },
          speed: 1.0,
          volume: 0.5,
        };
        cursor += duration;
        return seg;
      }),
    });
  });

  return {
    id: 'TEMPLATE-ID',
    fps: 30,
    duration: 0,
    canvas_config: { width: 1080, height: 1920, ratio: 'original' },
    custom_field: { keep: true },
    materials: {
      videos: [{
        id: TEMPLATE_MATERIAL_ID,
        type: 'video',
        path: spec.materialPath,
        material_name: 'template.mp4',
        duration: 60 * SEC,
        width: 1080,
        height: 1920,
        local_material_id: 'LOCAL-1',
      }],
      audios: [],
      texts: [{ id: 'TXT-1', content: 'hello' }],
    },
    tracks,
  };
}

/** Writes `<root>/<name>/draft_content.json` (+ meta) and returns the content file path. */
export function writeTemplate(root: string, name: string, spec: TemplateSpec, contentFile: string = DRAFT_FILES.content): string {
  const dir = path.join(root, name);
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, contentFile);
  fs.writeFileSync(file, JSON.stringify(templateContent(spec)), 'utf-8');
  fs.writeFileSync(
    path.join(dir, DRAFT_FILES.meta),
    JSON.stringify({ draft_name: name, draft_fold_path: dir, custom_meta: 'kept' }),
    'utf-8',
  );
  return file;
}

export function templateDraft(spec: TemplateSpec, name = 'job'): Draft {
  return parseContent(templateContent(spec), { name, dir: path.join(os.tmpdir(), name) });
}

export function emptyDraft(name = 'test'): Draft {
  return new Draft({ name, dir: path.join(os.tmpdir(), name), id: 'DRAFT-1', canvas: { width: 1920, height: 1080 }, fps: 30 });
}

// ── Fakes ─────────────────────────────────────────────────────────────────────

/** Resolves durations (in seconds) by file base name; no file access. */
export class FakeResolver implements DurationResolver {
  readonly calls: string[] = [];

  constructor(private readonly seconds: Record<string, number>) {}

  resolve(assetPath: string): ProbedAsset {
    const absolute = path.resolve(assetPath);
    this.calls.push(absolute);
    const secs = this.seconds[path.basename(absolute)];
    if (secs === undefined) throw new JobError('AssetNotFound', `Asset not found: ${absolute}`);
    return { path: absolute, duration: secondsToUnits(secs), width: 1920, height: 1080 };
  }
}

export class FakeExporter implements Exporter {
  readonly calls: Array<{ draftName: string; outputPath: string; fps: ExportFps }> = [];

  constructor(private readonly failWith?: Error) {}

  async export(draftName: string, outputPath: string, fps: ExportFps): Promise<void> {
    this.calls.push({ draftName, outputPath, fps });
    if (this.failWith) throw this.failWith;
  }
}

export class MemoryLedger implements JobLedger {
  readonly entries: JobLedgerEntry[] = [];

  async record(entry: JobLedgerEntry): Promise<void> {
    this.entries.push(entry);
  }

  statuses(): string[] {
    return this.entries.map(e => e.status);
  }
}
