/**
 * Segment filler: empties a template's video tracks and lays the given
 * assets end to end on one fresh video track.
 */
import { TRACK_NAMES } from '../config.js';
import { logger } from '../utils/logger.js';
import { JobError } from '../utils/errors.js';
import type { Draft } from '../draft/model.js';
import type { DurationResolver } from '../media/probe.js';
import { buildTimeline } from './builder.js';

export const FILL_STRATEGIES = ['error', 'cycle'] as const;

export type FillStrategy = typeof FILL_STRATEGIES[number];

/**
 * Expands the asset list for `slots` template segments.
 *
 * - `error`: fewer assets than slots is an InsufficientAssets failure; the
 *   list is otherwise used as given.
 * - `cycle`: the list repeats until it has max(slots, assets.length) entries.
 */
export function planFill(assets: readonly string[], strategy: FillStrategy, slots: number): string[] {
  if (assets.length === 0) {
    throw new JobError('InsufficientAssets', 'Fill needs at least one asset');
  }
  if (strategy === 'error') {
    if (assets.length < slots) {
      throw new JobError('InsufficientAssets', `Template has ${slots} segment(s) but only ${assets.length} asset(s) were given`);
    }
    return [...assets];
  }
  const count = Math.max(slots, assets.length);
  const plan: string[] = [];
  while (plan.length < count) plan.push(...assets.slice(0, count - plan.length));
  return plan;
}

/** Returns the new track's end, i.e. the filled timeline length. */
export function fillTemplate(
  draft: Draft,
  assets: readonly string[],
  strategy: FillStrategy,
  slots: number,
  resolver: DurationResolver,
): number {
  const plan = planFill(assets, strategy, slots);

  const videoTracks = draft.tracksOfType('video');
  const cleared = videoTracks.reduce((n, t) => n + t.length, 0);
  for (const track of videoTracks) track.clear();

  const track = draft.addTrack('video', TRACK_NAMES.fill);
  logger.info('Filler: video tracks cleared', { draft: draft.name, tracks: videoTracks.length, cleared, newTrack: track.name });

  return buildTimeline(draft, track.name, plan, resolver);
}
