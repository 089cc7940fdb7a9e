/**
 * Duration resolver: existence/type checks plus an ffprobe metadata read.
 *
 * Reads file metadata only; never decodes frames.
 */
import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { JobError } from '../utils/errors.js';
import { secondsToUnits } from '../draft/timerange.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ProbedAsset {
  path: string;
  /** Microseconds. */
  duration: number;
  width: number;
  height: number;
}

export interface DurationResolver {
  resolve(assetPath: string): ProbedAsset;
}

/** Runs ffprobe with the given arguments and returns stdout. */
export type ProbeRunner = (args: string[]) => string;

// ── Helpers ───────────────────────────────────────────────────────────────────

export function assertAssetFile(assetPath: string): string {
  const absolute = path.resolve(assetPath);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(absolute);
  } catch (err) {
    throw new JobError('AssetNotFound', `Asset not found: ${absolute}`, err);
  }
  if (!stat.isFile()) {
    throw new JobError('AssetNotAFile', `Asset is not a file: ${absolute}`);
  }
  return absolute;
}

function defaultRunner(binary: string): ProbeRunner {
  return (args) => execFileSync(binary, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
}

const PROBE_ARGS = [
  '-v', 'error',
  '-show_entries', 'format=duration:stream=codec_type,width,height',
  '-of', 'json',
];

const FfprobeOutputSchema = z.object({
  format: z.object({ duration: z.string().optional() }).optional(),
  streams: z.array(z.object({
    codec_type: z.string().optional(),
    width:      z.number().optional(),
    height:     z.number().optional(),
  })).default([]),
});

type FfprobeOutput = z.infer<typeof FfprobeOutputSchema>;

// ── Resolver ──────────────────────────────────────────────────────────────────

export class FfprobeDurationResolver implements DurationResolver {
  private readonly run: ProbeRunner;

  constructor(run?: ProbeRunner) {
    this.run = run ?? defaultRunner(env.FFPROBE_PATH);
  }

  resolve(assetPath: string): ProbedAsset {
    const absolute = assertAssetFile(assetPath);
    logger.debug('FFprobe: probing asset', { path: absolute });

    let out: FfprobeOutput;
    try {
      out = FfprobeOutputSchema.parse(JSON.parse(this.run([...PROBE_ARGS, absolute])));
    } catch (err) {
      const e = err as { stderr?: Buffer | string; message?: string };
      const stderr = e.stderr ? String(e.stderr).trim() : '';
      throw new JobError('AssetUnreadable', `Cannot read media container ${absolute}: ${stderr || String(err)}`, err);
    }

    const seconds = Number(out.format?.duration);
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new JobError('AssetUnreadable', `No duration in media container ${absolute}`);
    }

    const video = out.streams.find(s => s.codec_type === 'video');
    const probed: ProbedAsset = {
      path: absolute,
      duration: secondsToUnits(seconds),
      width: video?.width ?? 0,
      height: video?.height ?? 0,
    };
    logger.debug('FFprobe: asset probed', { ...probed });
    return probed;
  }
}

/** Resolves each path once; repeats are served from memory. */
export class CachedResolver implements DurationResolver {
  private readonly seen = new Map<string, ProbedAsset>();

  constructor(private readonly inner: DurationResolver) {}

  resolve(assetPath: string): ProbedAsset {
    const key = path.resolve(assetPath);
    const hit = this.seen.get(key);
    if (hit) return hit;
    const asset = this.inner.resolve(assetPath);
    this.seen.set(key, asset);
    return asset;
  }
}
