export type JobErrorCode =
  // input
  | 'InvalidRequest'
  | 'InvalidDraftName'
  | 'DraftsRootInvalid'
  | 'AssetNotFound'
  | 'AssetNotAFile'
  | 'AssetUnreadable'
  | 'InvalidOutputPath'
  | 'UnsupportedFrameRate'
  | 'TrackIndexOutOfRange'
  | 'SegmentIndexOutOfRange'
  | 'DuplicateSegmentIndex'
  | 'SegmentDurationMissing'
  | 'DurationLookupUnavailable'
  | 'InsufficientAssets'
  | 'EmptyTimeline'
  // state conflict
  | 'DraftAlreadyExists'
  | 'TemplateNotFound'
  // integrity
  | 'TemplateCorrupt'
  | 'SegmentOverlap'
  | 'InvalidTimerange'
  // downstream
  | 'ExportFailed';

/**
 * The one failure a job reports to its caller. Anything else escaping a flow
 * is an internal fault and is reported without detail.
 */
export class JobError extends Error {
  constructor(
    public readonly code: JobErrorCode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'JobError';
  }
}

export const isJobError = (err: unknown): err is JobError => err instanceof JobError;
