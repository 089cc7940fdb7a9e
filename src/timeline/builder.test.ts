import { describe, expect, it } from 'vitest';
import * as path from 'path';
import { SEC } from '../config.js';
import { buildTimeline } from './builder.js';
import { Segment } from '../draft/model.js';
import { timerange } from '../draft/timerange.js';
import { FakeResolver, TEMPLATE_MATERIAL_ID, catchJobError, emptyDraft, templateDraft } from '../testing/fixtures.js';

const targets = (segments: readonly Segment[]) => segments.map(s => s.target);

describe('buildTimeline', () => {
  it('lays assets end to end and skips empty ones', () => {
    const draft = emptyDraft();
    const track = draft.addTrack('video', 'video_main');
    const resolver = new FakeResolver({ 'a.mp4': 3, 'zero.mp4': 0, 'b.mp4': 2 });

    const total = buildTimeline(draft, track.name, ['a.mp4', 'zero.mp4', 'b.mp4'], resolver);

    expect(total).toBe(5 * SEC);
    expect(draft.duration).toBe(5 * SEC);
    expect(targets(track.segments)).toEqual([
      { start: 0, duration: 3 * SEC },
      { start: 3 * SEC, duration: 2 * SEC },
    ]);
    expect(track.segments.map(s => s.source)).toEqual([
      { start: 0, duration: 3 * SEC },
      { start: 0, duration: 2 * SEC },
    ]);
    expect(draft.materials.map(m => path.basename(m.path))).toEqual(['a.mp4', 'b.mp4']);
  });

  it('caps each asset', () => {
    const draft = emptyDraft();
    const track = draft.addTrack('video', 'video_main');
    const resolver = new FakeResolver({ 'a.mp4': 3, 'b.mp4': 4, 'c.mp4': 1 });

    const total = buildTimeline(draft, track.name, ['a.mp4', 'b.mp4', 'c.mp4'], resolver, { capSeconds: 2.5 });

    expect(total).toBe(6 * SEC);
    expect(targets(track.segments)).toEqual([
      { start: 0, duration: 2_500_000 },
      { start: 2_500_000, duration: 2_500_000 },
      { start: 5 * SEC, duration: SEC },
    ]);
    // the inventory keeps the full asset duration
    expect(draft.materials.map(m => m.duration)).toEqual([3 * SEC, 4 * SEC, SEC]);
  });

  it('registers one material per repeated path', () => {
    const draft = emptyDraft();
    const track = draft.addTrack('video', 'video_main');

    buildTimeline(draft, track.name, ['a.mp4', 'a.mp4'], new FakeResolver({ 'a.mp4': 1 }));

    expect(draft.materials).toHaveLength(1);
    expect(new Set(track.segments.map(s => s.materialId)).size).toBe(1);
    expect(track.end).toBe(2 * SEC);
  });

  it('refreshes the recorded duration of a reused material', () => {
    const draft = templateDraft({ videoTracks: [[4]], materialPath: '/media/template.mp4' });

    buildTimeline(draft, 'v0', ['/media/template.mp4'], new FakeResolver({ 'template.mp4': 5 }));

    const material = draft.findMaterialByPath('/media/template.mp4', 'video');
    expect(material?.id).toBe(TEMPLATE_MATERIAL_ID);
    expect(material?.duration).toBe(5 * SEC);
    expect(draft.findTrack('v0')?.segmentAt(1)?.target).toEqual({ start: 4 * SEC, duration: 5 * SEC });
  });

  it('fails with EmptyTimeline when nothing is usable', () => {
    const draft = emptyDraft();
    const track = draft.addTrack('video', 'video_main');
    const resolver = new FakeResolver({ 'zero.mp4': 0, 'none.mp4': 0 });

    expect(catchJobError(() => buildTimeline(draft, track.name, ['zero.mp4', 'none.mp4'], resolver)).code)
      .toBe('EmptyTimeline');
    expect(track.length).toBe(0);
    expect(draft.materials).toHaveLength(0);
  });

  it('appends after existing segments', () => {
    const draft = emptyDraft();
    const track = draft.addTrack('video', 'video_main');
    draft.addMaterial({ id: 'OLD', kind: 'video', path: '/m/old.mp4', name: 'old.mp4', duration: SEC, extra: {} });
    track.add(Segment.create('OLD', timerange(0, SEC), timerange(0, SEC)));

    const total = buildTimeline(draft, track.name, ['b.mp4'], new FakeResolver({ 'b.mp4': 2 }));

    expect(total).toBe(3 * SEC);
    expect(track.segmentAt(1)?.target).toEqual({ start: SEC, duration: 2 * SEC });
  });

  it('registers audio materials on audio tracks', () => {
    const draft = emptyDraft();
    const track = draft.addTrack('audio', 'music');

    buildTimeline(draft, track.name, ['song.mp3'], new FakeResolver({ 'song.mp3': 4 }));

    expect(draft.materials).toEqual([
      expect.objectContaining({ kind: 'audio', name: 'song.mp3', duration: 4 * SEC }),
    ]);
    expect(draft.materials[0]?.width).toBeUndefined();
  });

  it('rejects unknown and non-media tracks', () => {
    const draft = emptyDraft();
    draft.addTrack('text', 'captions');
    const resolver = new FakeResolver({ 'a.mp4': 1 });
    expect(() => buildTimeline(draft, 'missing', ['a.mp4'], resolver)).toThrow('Track "missing" does not exist');
    expect(() => buildTimeline(draft, 'captions', ['a.mp4'], resolver)).toThrow('cannot hold media segments');
  });

  it('propagates resolver failures', () => {
    const draft = emptyDraft();
    const track = draft.addTrack('video', 'video_main');
    expect(catchJobError(() => buildTimeline(draft, track.name, ['ghost.mp4'], new FakeResolver({}))).code)
      .toBe('AssetNotFound');
  });
});
