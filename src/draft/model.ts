/**
 * Typed draft model: Draft → Track → Segment, plus the material inventory.
 *
 * The on-disk project format carries far more than these types describe.
 * Whatever the model does not interpret rides along in `extra` and is written
 * back untouched by the codec in content.ts.
 */
import { randomUUID } from 'node:crypto';
import { DRAFT_FILES, INVALID_DRAFT_NAME_CHARS } from '../config.js';
import { JobError } from '../utils/errors.js';
import { end, overlaps, timerange, type Timerange } from './timerange.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export const TRACK_TYPES = ['video', 'audio', 'text', 'sticker', 'effect', 'filter', 'adjust'] as const;

export type TrackType = typeof TRACK_TYPES[number];

export type MaterialKind = 'video' | 'photo' | 'audio';

export type Extra = Record<string, unknown>;

export interface Canvas {
  width: number;
  height: number;
}

export interface Material {
  id: string;
  kind: MaterialKind;
  path: string;
  name: string;
  duration: number;
  width?: number;
  height?: number;
  extra: Extra;
}

export const newId = (): string => randomUUID().toUpperCase();

export const isMediaTrackType = (type: TrackType): boolean => type === 'video' || type === 'audio';

export function validateDraftName(raw: string): string {
  const name = raw.trim();
  if (!name) throw new JobError('InvalidDraftName', 'Draft name must not be empty');
  const bad = [...name].filter(ch => INVALID_DRAFT_NAME_CHARS.includes(ch));
  if (bad.length > 0) {
    throw new JobError('InvalidDraftName', `Draft name "${name}" contains illegal characters: ${[...new Set(bad)].join(' ')}`);
  }
  return name;
}

// ── Segment ───────────────────────────────────────────────────────────────────

export class Segment {
  private _target: Timerange;

  constructor(
    readonly id: string,
    public materialId: string,
    public source: Timerange | null,
    target: Timerange,
    readonly extra: Extra = {},
  ) {
    this._target = Segment.checkTarget(target);
  }

  static create(materialId: string, source: Timerange, target: Timerange): Segment {
    return new Segment(newId(), materialId, source, target);
  }

  get target(): Timerange {
    return this._target;
  }

  set target(range: Timerange) {
    this._target = Segment.checkTarget(range);
  }

  private static checkTarget(range: Timerange): Timerange {
    const checked = timerange(range.start, range.duration);
    if (checked.duration <= 0) {
      throw new JobError('InvalidTimerange', `Segment target duration must be > 0 (got ${checked.duration})`);
    }
    return checked;
  }
}

// ── Track ─────────────────────────────────────────────────────────────────────

export class Track {
  private readonly _segments: Segment[] = [];

  constructor(
    readonly id: string,
    readonly type: TrackType,
    readonly name: string,
    segments: Segment[] = [],
    readonly extra: Extra = {},
  ) {
    for (const seg of segments) this.add(seg);
  }

  get segments(): readonly Segment[] {
    return this._segments;
  }

  get length(): number {
    return this._segments.length;
  }

  /** End of the last segment, 0 for an empty track. */
  get end(): number {
    return this._segments.reduce((max, seg) => Math.max(max, end(seg.target)), 0);
  }

  segmentAt(index: number): Segment | undefined {
    return this._segments[index];
  }

  /** Inserts keeping ascending target start; rejects overlaps. */
  add(segment: Segment): void {
    const clash = this._segments.find(s => overlaps(s.target, segment.target));
    if (clash) {
      throw new JobError(
        'SegmentOverlap',
        `Segment [${segment.target.start}, ${end(segment.target)}) overlaps [${clash.target.start}, ${end(clash.target)}) on track "${this.name}"`,
      );
    }
    const at = this._segments.findIndex(s => s.target.start > segment.target.start);
    if (at === -1) this._segments.push(segment);
    else this._segments.splice(at, 0, segment);
  }

  /** Moves or resizes the segment at `index`; it may not run into a neighbour. */
  retime(index: number, range: Timerange): void {
    const segment = this._segments[index];
    if (!segment) throw new Error(`No segment at index ${index} on track "${this.name}"`);
    const clash = this._segments.find(s => s !== segment && overlaps(s.target, range));
    if (clash) {
      throw new JobError(
        'SegmentOverlap',
        `Segment ${index} retimed to [${range.start}, ${end(range)}) would overlap [${clash.target.start}, ${end(clash.target)}) on track "${this.name}"`,
      );
    }
    segment.target = range;
  }

  removeAt(index: number): Segment | undefined {
    return this._segments.splice(index, 1)[0];
  }

  /** Removes every segment matching the predicate; returns how many went. */
  removeWhere(predicate: (segment: Segment) => boolean): number {
    const before = this._segments.length;
    const kept = this._segments.filter(s => !predicate(s));
    this._segments.splice(0, this._segments.length, ...kept);
    return before - kept.length;
  }

  clear(): void {
    this._segments.length = 0;
  }
}

// ── Draft ─────────────────────────────────────────────────────────────────────

export interface DraftInit {
  name: string;
  dir: string;
  /** Description file name inside `dir`. */
  contentFile?: string;
  id: string;
  canvas: Canvas;
  fps: number;
  tracks?: Track[];
  materials?: Material[];
  extra?: Extra;
  meta?: Extra;
}

export class Draft {
  readonly name: string;
  readonly dir: string;
  readonly contentFile: string;
  readonly id: string;
  readonly canvas: Canvas;
  readonly fps: number;
  readonly tracks: Track[];
  /** Top-level description fields the model does not interpret. */
  readonly extra: Extra;
  /** Parsed draft_meta_info.json, when the folder has one. */
  readonly meta: Extra | undefined;

  private readonly _materials = new Map<string, Material>();

  constructor(init: DraftInit) {
    if (!(init.canvas.width > 0 && init.canvas.height > 0)) {
      throw new JobError('InvalidRequest', `Canvas must be positive (got ${init.canvas.width}x${init.canvas.height})`);
    }
    if (!Number.isInteger(init.fps) || init.fps <= 0) {
      throw new JobError('InvalidRequest', `Frame rate must be a positive integer (got ${init.fps})`);
    }
    this.name = validateDraftName(init.name);
    this.dir = init.dir;
    this.contentFile = init.contentFile ?? DRAFT_FILES.content;
    this.id = init.id;
    this.canvas = init.canvas;
    this.fps = init.fps;
    this.tracks = init.tracks ?? [];
    this.extra = init.extra ?? {};
    this.meta = init.meta;
    for (const m of init.materials ?? []) this._materials.set(m.id, m);
  }

  /** Timeline length: the furthest segment end over all tracks. */
  get duration(): number {
    return this.tracks.reduce((max, t) => Math.max(max, t.end), 0);
  }

  // ── Tracks ──────────────────────────────────────────────────────────────────

  tracksOfType(type: TrackType): Track[] {
    return this.tracks.filter(t => t.type === type);
  }

  findTrack(name: string): Track | undefined {
    return this.tracks.find(t => t.name === name);
  }

  uniqueTrackName(base: string): string {
    const taken = new Set(this.tracks.map(t => t.name));
    if (!taken.has(base)) return base;
    let n = 1;
    while (taken.has(`${base}_${n}`)) n++;
    return `${base}_${n}`;
  }

  /** Adds an empty track under `baseName`, suffixed until unique. */
  addTrack(type: TrackType, baseName: string): Track {
    const track = new Track(newId(), type, this.uniqueTrackName(baseName));
    this.tracks.push(track);
    return track;
  }

  // ── Materials ───────────────────────────────────────────────────────────────

  get materials(): Material[] {
    return [...this._materials.values()];
  }

  getMaterial(id: string): Material | undefined {
    return this._materials.get(id);
  }

  findMaterialByPath(path: string, kind: MaterialKind): Material | undefined {
    return this.materials.find(m => m.path === path && m.kind === kind);
  }

  addMaterial(material: Material): Material {
    this._materials.set(material.id, material);
    return material;
  }

  removeMaterial(id: string): boolean {
    return this._materials.delete(id);
  }
}
