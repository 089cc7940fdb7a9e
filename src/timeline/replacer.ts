/**
 * Segment replacer: swaps the material under chosen segments of a template's
 * video track.
 *
 * Replacements run in ascending segment-index order. An asset used for several
 * segments is consumed front to back: each segment takes the next slice of it.
 * A slice shorter than the segment shortens the segment from the tail (start
 * stays put, later segments are not moved). Once an asset is used up, the
 * remaining segments assigned to it are deleted.
 */
import * as fs from 'fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { JobError } from '../utils/errors.js';
import { timerange } from '../draft/timerange.js';
import type { Draft, Material, Track } from '../draft/model.js';
import type { DurationResolver } from '../media/probe.js';
import { ensureMaterial } from './builder.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Replacement {
  segmentIndex: number;
  path: string;
}

export interface ReplaceReport {
  /** Final consumption offset per resolved asset path. */
  consumed: Map<string, number>;
  /** Deleted segment indices, in the (descending) order they were removed. */
  removed: number[];
}

// Just the part of the description the duration lookup reads.
const DurationsSchema = z.object({
  tracks: z.array(z.object({
    type: z.string(),
    segments: z.array(z.object({
      target_timerange: z.object({ duration: z.number().int() }),
    })).default([]),
  })).default([]),
});

// ── Lookups ───────────────────────────────────────────────────────────────────

/**
 * Reads segment index → original target duration for the `videoTrackIndex`-th
 * video track of a template description.
 */
export function readOriginalDurations(templatePath: string | undefined, videoTrackIndex: number): Map<number, number> {
  if (!templatePath) {
    throw new JobError('DurationLookupUnavailable', 'No template description path is known; segment durations cannot be read');
  }
  if (!fs.existsSync(templatePath)) {
    throw new JobError('TemplateNotFound', `Template description not found: ${templatePath}`);
  }

  let description: z.infer<typeof DurationsSchema>;
  try {
    description = DurationsSchema.parse(JSON.parse(fs.readFileSync(templatePath, 'utf-8')));
  } catch (err) {
    throw new JobError('TemplateCorrupt', `Template description ${templatePath} is unreadable`, err);
  }

  const videoTracks = description.tracks.filter(t => t.type === 'video');
  const track = videoTracks[videoTrackIndex];
  if (!track) {
    throw new JobError(
      'TrackIndexOutOfRange',
      `Video track index ${videoTrackIndex} out of range (template has ${videoTracks.length} video track(s))`,
    );
  }
  return new Map(track.segments.map((s, i) => [i, s.target_timerange.duration]));
}

export function selectVideoTrack(draft: Draft, videoTrackIndex: number): Track {
  const videoTracks = draft.tracksOfType('video');
  const track = videoTracks[videoTrackIndex];
  if (!track) {
    throw new JobError(
      'TrackIndexOutOfRange',
      `Video track index ${videoTrackIndex} out of range (draft has ${videoTracks.length} video track(s))`,
    );
  }
  return track;
}

// ── Replace ───────────────────────────────────────────────────────────────────

/**
 * Checks replacement indices against a track of `segmentCount` segments. Runs
 * against the template's recorded durations before the template is copied, and
 * again against the copied track before anything changes.
 */
export function validateReplacements(
  replacements: readonly Replacement[],
  originalDurations: ReadonlyMap<number, number>,
  segmentCount: number,
  trackLabel: string,
): void {
  const seen = new Set<number>();
  for (const { segmentIndex } of replacements) {
    if (seen.has(segmentIndex)) {
      throw new JobError('DuplicateSegmentIndex', `Segment ${segmentIndex} is listed more than once`);
    }
    seen.add(segmentIndex);
    if (!Number.isInteger(segmentIndex) || segmentIndex < 0 || segmentIndex >= segmentCount) {
      throw new JobError(
        'SegmentIndexOutOfRange',
        `Segment index ${segmentIndex} out of range (${trackLabel} has ${segmentCount} segment(s))`,
      );
    }
    if (!originalDurations.has(segmentIndex)) {
      throw new JobError('SegmentDurationMissing', `Template has no duration recorded for segment ${segmentIndex}`);
    }
  }
}

export function replaceSegments(
  draft: Draft,
  track: Track,
  originalDurations: ReadonlyMap<number, number>,
  replacements: readonly Replacement[],
  resolver: DurationResolver,
): ReplaceReport {
  validateReplacements(replacements, originalDurations, track.length, `track "${track.name}"`);

  const ordered = [...replacements].sort((a, b) => a.segmentIndex - b.segmentIndex);
  const usage = new Map<string, { material: Material; offset: number; duration: number }>();
  const doomed: number[] = [];

  for (const { segmentIndex, path } of ordered) {
    const segment = track.segmentAt(segmentIndex);
    const targetDuration = originalDurations.get(segmentIndex);
    // validateReplacements() guarantees both
    if (!segment || targetDuration === undefined) continue;

    const asset = resolver.resolve(path);
    let state = usage.get(asset.path);
    if (!state) {
      state = { material: ensureMaterial(draft, asset, 'video'), offset: 0, duration: asset.duration };
      usage.set(asset.path, state);
    }

    const remaining = state.duration - state.offset;
    if (remaining <= 0) {
      logger.warn('Replacer: asset exhausted, segment will be removed', { segmentIndex, path: asset.path });
      doomed.push(segmentIndex);
      continue;
    }

    const use = Math.min(targetDuration, remaining);
    segment.materialId = state.material.id;
    segment.source = timerange(state.offset, use);
    track.retime(segmentIndex, timerange(segment.target.start, use));
    if (use < targetDuration) {
      logger.info('Replacer: asset shorter than segment, tail truncated', { segmentIndex, targetDuration, use });
    }
    state.offset += use;
  }

  const removed = doomed.sort((a, b) => b - a);
  for (const index of removed) track.removeAt(index);

  const consumed = new Map([...usage].map(([p, s]) => [p, s.offset]));
  logger.info('Replacer: replacements applied', {
    track: track.name,
    replaced: ordered.length - removed.length,
    removed,
  });
  return { consumed, removed };
}
