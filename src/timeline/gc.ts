/**
 * Material garbage collector.
 *
 * Drops inventory entries whose file is gone, then every video/audio segment
 * pointing at a dropped entry or at an id the inventory does not have.
 * Missing files are pruned and logged, never reported as a failure.
 */
import * as fs from 'fs';
import { logger } from '../utils/logger.js';
import { isMediaTrackType, type Draft } from '../draft/model.js';

export interface CollectReport {
  removedMaterials: string[];
  removedSegments: number;
}

export type ExistsCheck = (path: string) => boolean;

export function collectOrphans(draft: Draft, exists: ExistsCheck = fs.existsSync): CollectReport {
  const removedMaterials: string[] = [];

  for (const material of draft.materials) {
    let present: boolean;
    try {
      present = material.path !== '' && exists(material.path);
    } catch (err) {
      logger.warn('GC: existence check failed, treating as missing', { id: material.id, path: material.path, err });
      present = false;
    }
    if (!present) {
      draft.removeMaterial(material.id);
      removedMaterials.push(material.id);
      logger.warn('GC: material file missing, removed', { id: material.id, path: material.path });
    }
  }

  let removedSegments = 0;
  for (const track of draft.tracks) {
    if (!isMediaTrackType(track.type)) continue;
    const n = track.removeWhere(seg => draft.getMaterial(seg.materialId) === undefined);
    if (n > 0) logger.warn('GC: dangling segments removed', { track: track.name, count: n });
    removedSegments += n;
  }

  if (removedMaterials.length > 0 || removedSegments > 0) {
    logger.info('GC: draft cleaned', { draft: draft.name, removedMaterials: removedMaterials.length, removedSegments });
  }
  return { removedMaterials, removedSegments };
}
