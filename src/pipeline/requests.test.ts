import { describe, expect, it } from 'vitest';
import { draftsRootOf, parseJobRequest } from './requests.js';
import { catchJobError } from '../testing/fixtures.js';

const base = { job_id: 'promo', output_path: '/renders/promo.mp4', fps: 30 };

describe('parseJobRequest', () => {
  it('parses a concat request', () => {
    const req = parseJobRequest({
      ...base,
      flow: 'concat',
      canvas: { width: 1080, height: 1920 },
      videos: ['/m/a.mp4'],
      options: { max_each_video_seconds: 2.5 },
    });
    expect(req.flow).toBe('concat');
    if (req.flow !== 'concat') return;
    expect(req.options?.max_each_video_seconds).toBe(2.5);
    expect(req.drafts_root).toBeUndefined();
  });

  it('defaults the video track index and fill strategy', () => {
    const replace = parseJobRequest({
      ...base,
      flow: 'template-replace',
      template_name: 'tpl',
      replacements: [{ segment_index: 0, path: '/m/a.mp4' }],
    });
    expect(replace).toMatchObject({ video_track_index: 0 });

    const fill = parseJobRequest({ ...base, flow: 'template-fill', template_name: 'tpl', assets: ['/m/a.mp4'] });
    expect(fill).toMatchObject({ video_track_index: 0, fill_strategy: 'error' });
  });

  it('trims the job id', () => {
    const req = parseJobRequest({ ...base, job_id: '  promo  ', flow: 'template-fill', template_name: 'tpl', assets: ['a'] });
    expect(req.job_id).toBe('promo');
  });

  it('reports every problem as InvalidRequest', () => {
    const cases: unknown[] = [
      null,
      { ...base, flow: 'remix' },
      { ...base, flow: 'concat', job_id: 'a/b', canvas: { width: 1, height: 1 }, videos: ['a'] },
      { ...base, flow: 'concat', fps: 29.97, canvas: { width: 1, height: 1 }, videos: ['a'] },
      { ...base, flow: 'concat', canvas: { width: 0, height: 1 }, videos: ['a'] },
      { ...base, flow: 'concat', canvas: { width: 1, height: 1 }, videos: [] },
      { ...base, flow: 'template-fill', template_name: 'tpl', assets: ['a'], fill_strategy: 'shuffle' },
      { ...base, flow: 'template-replace', template_name: 'tpl', replacements: [{ segment_index: -1, path: 'a' }] },
    ];
    for (const body of cases) {
      expect(catchJobError(() => parseJobRequest(body)).code).toBe('InvalidRequest');
    }
  });

  it('names the offending field', () => {
    const err = catchJobError(() => parseJobRequest({
      ...base, flow: 'concat', job_id: 'a/b', canvas: { width: 1, height: 1 }, videos: ['a'],
    }));
    expect(err.message).toBe('Invalid request: job_id: must not contain any of <>:"/\\|?*');
  });
});

describe('draftsRootOf', () => {
  it('prefers the request and requires a root somewhere', () => {
    const req = parseJobRequest({ ...base, flow: 'template-fill', template_name: 'tpl', assets: ['a'] });
    expect(catchJobError(() => draftsRootOf(req)).code).toBe('DraftsRootInvalid');
    expect(draftsRootOf({ ...req, drafts_root: '/drafts' })).toBe('/drafts');
  });
});
