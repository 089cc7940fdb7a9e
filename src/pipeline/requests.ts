import { z } from 'zod';
import { env, INVALID_DRAFT_NAME_CHARS } from '../config.js';
import { FILL_STRATEGIES } from '../timeline/filler.js';
import { JobError } from '../utils/errors.js';

// ── Shared fields ─────────────────────────────────────────────────────────────

const JobId = z.string()
  .trim()
  .min(1)
  .refine(v => ![...v].some(ch => INVALID_DRAFT_NAME_CHARS.includes(ch)), {
    message: `must not contain any of ${INVALID_DRAFT_NAME_CHARS}`,
  });

const FilePath = z.string().trim().min(1);

const Canvas = z.object({
  width:  z.number().int().positive(),
  height: z.number().int().positive(),
});

const BaseRequest = z.object({
  job_id:      JobId,
  drafts_root: FilePath.optional(),
  output_path: FilePath,
  fps:         z.number().int().positive(),
});

// ── Flows ─────────────────────────────────────────────────────────────────────

export const ConcatRequestSchema = BaseRequest.extend({
  flow:    z.literal('concat'),
  canvas:  Canvas,
  videos:  z.array(FilePath).min(1),
  options: z.object({
    max_each_video_seconds: z.number().positive().optional(),
  }).optional(),
});

const TemplateRequest = BaseRequest.extend({
  template_name:     z.string().trim().min(1),
  template_path:     FilePath.optional(),
  video_track_index: z.number().int().nonnegative().default(0),
});

export const TemplateReplaceRequestSchema = TemplateRequest.extend({
  flow:         z.literal('template-replace'),
  replacements: z.array(z.object({
    segment_index: z.number().int().nonnegative(),
    path:          FilePath,
  })).min(1),
});

export const TemplateFillRequestSchema = TemplateRequest.extend({
  flow:          z.literal('template-fill'),
  assets:        z.array(FilePath).min(1),
  fill_strategy: z.enum(FILL_STRATEGIES).default('error'),
});

export const JobRequestSchema = z.discriminatedUnion('flow', [
  ConcatRequestSchema,
  TemplateReplaceRequestSchema,
  TemplateFillRequestSchema,
]);

export type ConcatRequest = z.infer<typeof ConcatRequestSchema>;
export type TemplateReplaceRequest = z.infer<typeof TemplateReplaceRequestSchema>;
export type TemplateFillRequest = z.infer<typeof TemplateFillRequestSchema>;
export type JobRequest = z.infer<typeof JobRequestSchema>;
export type Flow = JobRequest['flow'];

// ── Parsing ───────────────────────────────────────────────────────────────────

/** Validates an untrusted request body; failures become InvalidRequest. */
export function parseJobRequest(body: unknown): JobRequest {
  const parsed = JobRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new JobError('InvalidRequest', `Invalid request: ${issues}`);
  }
  return parsed.data;
}

export function draftsRootOf(request: JobRequest): string {
  const root = request.drafts_root ?? env.DRAFTS_ROOT;
  if (!root) {
    throw new JobError('DraftsRootInvalid', 'No drafts_root in request and DRAFTS_ROOT is not set');
  }
  return root;
}
