import { describe, expect, it } from 'vitest';
import * as os from 'os';
import { Draft, Segment, Track, newId, validateDraftName } from './model.js';
import { timerange } from './timerange.js';
import { catchJobError, emptyDraft } from '../testing/fixtures.js';

const seg = (start: number, duration: number, materialId = 'M1') =>
  Segment.create(materialId, timerange(0, duration), timerange(start, duration));

describe('validateDraftName', () => {
  it('trims surrounding whitespace', () => {
    expect(validateDraftName('  promo clip ')).toBe('promo clip');
  });

  it('rejects empty names', () => {
    expect(catchJobError(() => validateDraftName('   ')).code).toBe('InvalidDraftName');
  });

  it('rejects characters folders cannot hold', () => {
    for (const bad of ['a/b', 'a\\b', 'what?', 'x:y', 'a|b', '<tag>', 'star*', 'say "hi"']) {
      expect(catchJobError(() => validateDraftName(bad)).code).toBe('InvalidDraftName');
    }
  });
});

describe('newId', () => {
  it('returns distinct upper-case uuids', () => {
    const a = newId();
    expect(a).toMatch(/^[0-9A-F]{8}-[0-9A-F]{4}-[0-9A-F]{4}-[0-9A-F]{4}-[0-9A-F]{12}$/);
    expect(newId()).not.toBe(a);
  });
});

describe('Segment', () => {
  it('requires a positive target duration', () => {
    expect(catchJobError(() => seg(0, 0)).code).toBe('InvalidTimerange');
  });

  it('checks targets assigned later', () => {
    const s = seg(0, 10);
    expect(catchJobError(() => { s.target = timerange(0, 0); }).code).toBe('InvalidTimerange');
    expect(s.target).toEqual({ start: 0, duration: 10 });
  });
});

describe('Track', () => {
  it('keeps segments ordered by target start', () => {
    const track = new Track('T1', 'video', 'main');
    track.add(seg(5, 2));
    track.add(seg(0, 5));
    track.add(seg(9, 1));
    expect(track.segments.map(s => s.target.start)).toEqual([0, 5, 9]);
    expect(track.end).toBe(10);
  });

  it('rejects overlapping segments', () => {
    const track = new Track('T1', 'video', 'main', [seg(0, 5)]);
    expect(catchJobError(() => track.add(seg(4, 2))).code).toBe('SegmentOverlap');
    expect(track.length).toBe(1);
  });

  it('retimes a segment within its gap only', () => {
    const track = new Track('T1', 'video', 'main', [seg(0, 5), seg(5, 5)]);
    track.retime(0, timerange(0, 3));
    expect(track.segmentAt(0)?.target).toEqual({ start: 0, duration: 3 });
    expect(catchJobError(() => track.retime(0, timerange(0, 6))).code).toBe('SegmentOverlap');
  });

  it('removes segments by predicate and index', () => {
    const track = new Track('T1', 'audio', 'music', [seg(0, 1, 'A'), seg(1, 1, 'B'), seg(2, 1, 'A')]);
    expect(track.removeWhere(s => s.materialId === 'A')).toBe(2);
    expect(track.segments.map(s => s.materialId)).toEqual(['B']);
    expect(track.removeAt(0)?.materialId).toBe('B');
    expect(track.length).toBe(0);
    expect(track.end).toBe(0);
  });
});

describe('Draft', () => {
  it('validates canvas and frame rate', () => {
    const base = { name: 'd', dir: os.tmpdir(), id: 'D' };
    expect(catchJobError(() => new Draft({ ...base, canvas: { width: 0, height: 1080 }, fps: 30 })).code).toBe('InvalidRequest');
    expect(catchJobError(() => new Draft({ ...base, canvas: { width: 1920, height: 1080 }, fps: 29.97 })).code).toBe('InvalidRequest');
    expect(catchJobError(() => new Draft({ ...base, canvas: { width: 1920, height: 1080 }, fps: 0 })).code).toBe('InvalidRequest');
  });

  it('suffixes generated track names until unique', () => {
    const draft = emptyDraft();
    expect(draft.addTrack('video', 'video_main').name).toBe('video_main');
    expect(draft.addTrack('video', 'video_main').name).toBe('video_main_1');
    expect(draft.addTrack('audio', 'video_main').name).toBe('video_main_2');
    expect(draft.tracksOfType('video')).toHaveLength(2);
  });

  it('measures duration as the furthest track end', () => {
    const draft = emptyDraft();
    draft.addTrack('video', 'v').add(seg(0, 4));
    draft.addTrack('audio', 'a').add(seg(2, 5));
    expect(draft.duration).toBe(7);
  });

  it('looks materials up by path and kind', () => {
    const draft = emptyDraft();
    draft.addMaterial({ id: 'V', kind: 'video', path: '/m/clip.mp4', name: 'clip.mp4', duration: 10, extra: {} });
    expect(draft.findMaterialByPath('/m/clip.mp4', 'video')?.id).toBe('V');
    expect(draft.findMaterialByPath('/m/clip.mp4', 'audio')).toBeUndefined();
    expect(draft.removeMaterial('V')).toBe(true);
    expect(draft.getMaterial('V')).toBeUndefined();
  });
});
