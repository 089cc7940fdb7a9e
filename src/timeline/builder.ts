/**
 * Timeline builder: appends assets back-to-back onto one track.
 *
 * Each usable asset becomes one segment whose source range starts at 0;
 * the cursor starts at the track's current end and advances by each
 * segment's duration, so segments come out contiguous.
 */
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { JobError } from '../utils/errors.js';
import { Segment, newId, type Draft, type Material, type MaterialKind, type Track } from '../draft/model.js';
import { secondsToUnits, timerange, unitsToSeconds } from '../draft/timerange.js';
import type { DurationResolver, ProbedAsset } from '../media/probe.js';

export interface BuildOptions {
  /** Per-asset limit in whole or fractional seconds; truncated to the time base. */
  capSeconds?: number;
}

/**
 * Reuses the inventory entry for `asset.path` or registers a new one. A reused
 * entry takes the probed duration, since the file may have changed since the
 * draft was saved.
 */
export function ensureMaterial(draft: Draft, asset: ProbedAsset, kind: MaterialKind): Material {
  const existing = draft.findMaterialByPath(asset.path, kind);
  if (existing) {
    if (existing.duration !== asset.duration) {
      logger.info('Builder: refreshed stale material duration', {
        path: asset.path,
        recorded: existing.duration,
        probed: asset.duration,
      });
      existing.duration = asset.duration;
    }
    return existing;
  }
  const sized = kind === 'audio' ? {} : { width: asset.width, height: asset.height };
  return draft.addMaterial({
    id: newId(),
    kind,
    path: asset.path,
    name: path.basename(asset.path),
    duration: asset.duration,
    ...sized,
    extra: {},
  });
}

function materialKindFor(track: Track): MaterialKind {
  if (track.type === 'video') return 'video';
  if (track.type === 'audio') return 'audio';
  throw new Error(`Track "${track.name}" of type ${track.type} cannot hold media segments`);
}

/**
 * Appends `assets` in order to the track named `trackName` and returns the
 * resulting track end. Assets with no usable duration are skipped with a
 * warning; if nothing at all was placed the build fails with EmptyTimeline.
 */
export function buildTimeline(
  draft: Draft,
  trackName: string,
  assets: readonly string[],
  resolver: DurationResolver,
  options: BuildOptions = {},
): number {
  const track = draft.findTrack(trackName);
  if (!track) throw new Error(`Track "${trackName}" does not exist in draft "${draft.name}"`);
  const kind = materialKindFor(track);
  const cap = options.capSeconds === undefined ? undefined : secondsToUnits(options.capSeconds);

  const start = track.end;
  let cursor = start;

  for (const assetPath of assets) {
    logger.info('Builder: processing asset', { path: assetPath, track: track.name });
    const asset = resolver.resolve(assetPath);

    const usable = cap === undefined ? asset.duration : Math.min(asset.duration, cap);
    if (usable <= 0) {
      logger.warn('Builder: asset has no usable duration, skipped', { path: asset.path, duration: asset.duration });
      continue;
    }

    const material = ensureMaterial(draft, asset, kind);
    track.add(Segment.create(material.id, timerange(0, usable), timerange(cursor, usable)));
    cursor += usable;
  }

  if (cursor === start) {
    throw new JobError('EmptyTimeline', 'No asset had a usable duration; nothing was written to the timeline');
  }

  logger.info('Builder: timeline built', {
    draft: draft.name,
    track: track.name,
    segments: track.length,
    totalSeconds: unitsToSeconds(cursor),
  });
  return cursor;
}
