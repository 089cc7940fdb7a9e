/**
 * draft_content.json codec.
 *
 * parseContent validates the handful of fields the engine relies on and
 * splits everything else into `extra`; serializeContent merges it back.
 * Defaults below only fill keys a segment/track/material does not already
 * carry, so template data always wins.
 */
import { z } from 'zod';
import * as path from 'path';
import { Draft, Segment, Track, TRACK_TYPES, isMediaTrackType, type Extra, type Material, type MaterialKind } from './model.js';
import type { Timerange } from './timerange.js';

// ── Schemas ───────────────────────────────────────────────────────────────────

const TimerangeSchema = z.object({
  start:    z.number().int().nonnegative(),
  duration: z.number().int(),
});

const SegmentSchema = z.object({
  id:               z.string(),
  material_id:      z.string(),
  source_timerange: TimerangeSchema.nullable().optional(),
  target_timerange: TimerangeSchema,
}).passthrough();

const TrackSchema = z.object({
  id:       z.string(),
  type:     z.enum(TRACK_TYPES),
  name:     z.string().default(''),
  segments: z.array(SegmentSchema).default([]),
}).passthrough();

const MaterialSchema = z.object({
  id:            z.string(),
  type:          z.string().optional(),
  path:          z.string().default(''),
  material_name: z.string().optional(),
  name:          z.string().optional(),
  duration:      z.number().default(0),
  width:         z.number().optional(),
  height:        z.number().optional(),
}).passthrough();

export const DraftContentSchema = z.object({
  id:            z.string().default(''),
  fps:           z.number().positive(),
  duration:      z.number().default(0),
  canvas_config: z.object({
    width:  z.number().positive(),
    height: z.number().positive(),
  }).passthrough(),
  tracks:        z.array(TrackSchema).default([]),
  materials:     z.object({
    videos: z.array(MaterialSchema).default([]),
    audios: z.array(MaterialSchema).default([]),
  }).passthrough(),
}).passthrough();

export type DraftContent = z.infer<typeof DraftContentSchema>;

type RawMaterial = z.infer<typeof MaterialSchema>;

// ── Defaults for entries the engine creates ──────────────────────────────────

const MEDIA_SEGMENT_DEFAULTS: Extra = {
  clip: {
    alpha: 1.0,
    flip: { horizontal: false, vertical: false },
    rotation: 0.0,
    scale: { x: 1.0, y: 1.0 },
    transform: { x: 0.0, y: 0.0 },
  },
  common_keyframes: [],
  enable_adjust: true,
  extra_material_refs: [],
  keyframe_refs: [],
  last_nonzero_volume: 1.0,
  render_index: 0,
  reverse: false,
  speed: 1.0,
  uniform_scale: { on: true, value: 1.0 },
  visible: true,
  volume: 1.0,
};

const TRACK_DEFAULTS: Extra = { attribute: 0, flag: 0, is_default_name: false };

const MATERIAL_DEFAULTS: Record<MaterialKind, Extra> = {
  video: { category_name: 'local', check_flag: 1, has_audio: true, local_material_id: '' },
  photo: { category_name: 'local', check_flag: 1, has_audio: false, local_material_id: '' },
  audio: { category_name: 'local', check_flag: 1 },
};

// ── Parse ─────────────────────────────────────────────────────────────────────

function split(raw: Record<string, unknown>, keys: readonly string[]): Extra {
  const extra: Extra = { ...raw };
  for (const k of keys) delete extra[k];
  return extra;
}

function toMaterial(raw: RawMaterial, list: 'videos' | 'audios'): Material {
  const kind: MaterialKind = list === 'audios' ? 'audio' : raw.type === 'photo' ? 'photo' : 'video';
  return {
    id:       raw.id,
    kind,
    path:     raw.path,
    name:     raw.material_name ?? raw.name ?? path.basename(raw.path),
    duration: raw.duration,
    width:    raw.width,
    height:   raw.height,
    extra:    split(raw, ['id', 'type', 'path', 'material_name', 'name', 'duration', 'width', 'height']),
  };
}

export interface ParseTarget {
  name: string;
  dir: string;
  contentFile?: string;
  meta?: Extra;
  /** Replaces the id stored in the file (materialized copies get their own). */
  id?: string;
}

/** Validates raw JSON and builds the typed draft it describes. */
export function parseContent(raw: unknown, target: ParseTarget): Draft {
  const content = DraftContentSchema.parse(raw);

  const tracks = content.tracks.map(t => new Track(
    t.id,
    t.type,
    t.name,
    t.segments.map(s => new Segment(
      s.id,
      s.material_id,
      s.source_timerange ?? null,
      s.target_timerange,
      split(s, ['id', 'material_id', 'source_timerange', 'target_timerange']),
    )),
    split(t, ['id', 'type', 'name', 'segments']),
  ));

  const materials = [
    ...content.materials.videos.map(m => toMaterial(m, 'videos')),
    ...content.materials.audios.map(m => toMaterial(m, 'audios')),
  ];

  return new Draft({
    name: target.name,
    dir: target.dir,
    contentFile: target.contentFile,
    id: target.id ?? content.id,
    canvas: { width: content.canvas_config.width, height: content.canvas_config.height },
    fps: content.fps,
    tracks,
    materials,
    meta: target.meta,
    extra: split(content, ['id', 'fps', 'duration', 'tracks']),
  });
}

// ── Serialize ─────────────────────────────────────────────────────────────────

const range = (r: Timerange): Timerange => ({ start: r.start, duration: r.duration });

function fromMaterial(m: Material): Extra {
  const sized = m.width !== undefined && m.height !== undefined ? { width: m.width, height: m.height } : {};
  return {
    ...MATERIAL_DEFAULTS[m.kind],
    ...m.extra,
    id: m.id,
    type: m.kind,
    path: m.path,
    material_name: m.name,
    duration: m.duration,
    ...sized,
  };
}

function categories(extra: Extra): Extra {
  const materials = extra['materials'];
  return typeof materials === 'object' && materials !== null && !Array.isArray(materials)
    ? { ...materials }
    : {};
}

export function serializeContent(draft: Draft): Extra {
  const canvas = draft.extra['canvas_config'];
  const canvasExtra = typeof canvas === 'object' && canvas !== null ? canvas : {};
  return {
    ...draft.extra,
    id: draft.id,
    fps: draft.fps,
    duration: draft.duration,
    canvas_config: { ...canvasExtra, width: draft.canvas.width, height: draft.canvas.height },
    materials: {
      ...categories(draft.extra),
      videos: draft.materials.filter(m => m.kind !== 'audio').map(fromMaterial),
      audios: draft.materials.filter(m => m.kind === 'audio').map(fromMaterial),
    },
    tracks: draft.tracks.map(t => ({
      ...TRACK_DEFAULTS,
      ...t.extra,
      id: t.id,
      type: t.type,
      name: t.name,
      segments: t.segments.map(s => ({
        ...(isMediaTrackType(t.type) ? MEDIA_SEGMENT_DEFAULTS : {}),
        ...s.extra,
        id: s.id,
        material_id: s.materialId,
        source_timerange: s.source ? range(s.source) : null,
        target_timerange: range(s.target),
      })),
    })),
  };
}
