/**
 * Template store: finds templates, materializes them into new draft folders,
 * creates fresh drafts, and persists drafts back to disk.
 *
 * A template is never written to. Every mutation happens on a copy under
 * `<drafts root>/<draft name>`, and a copy is refused if that folder already
 * exists (checked before anything is copied).
 */
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ZodError } from 'zod';
import { DRAFT_FILES } from '../config.js';
import { logger } from '../utils/logger.js';
import { JobError, isJobError } from '../utils/errors.js';
import { parseContent, serializeContent } from './content.js';
import { Draft, newId, validateDraftName, type Canvas, type Extra } from './model.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface TemplateStoreOptions {
  /** Description file used for duration lookups when a request names none. */
  defaultTemplatePath?: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

const SKELETONS = {
  content: 'draft_content_template.json',
  meta:    'draft_meta_info_template.json',
} as const;

function findAssetsDir(): string {
  // src/draft when run from source, dist/src/draft when built
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [path.resolve(here, '../../assets'), path.resolve(here, '../../../assets')];
  const found = candidates.find(dir => fs.existsSync(path.join(dir, SKELETONS.content)));
  if (!found) throw new Error(`Draft skeleton not found (looked in ${candidates.join(', ')})`);
  return found;
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

function readSkeleton(kind: keyof typeof SKELETONS): Extra {
  const file = path.join(findAssetsDir(), SKELETONS[kind]);
  const raw = readJson(file);
  if (!isObject(raw)) throw new Error(`Draft skeleton ${file} is not a JSON object`);
  return raw;
}

function isObject(value: unknown): value is Extra {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function ensureDraftsRoot(root: string): string {
  const resolved = path.resolve(root);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw new JobError('DraftsRootInvalid', `Drafts root is not a directory: ${resolved}`);
  }
  return resolved;
}

// ── Store ─────────────────────────────────────────────────────────────────────

export class TemplateStore {
  constructor(private readonly options: TemplateStoreOptions = {}) {}

  get defaultTemplatePath(): string | undefined {
    return this.options.defaultTemplatePath;
  }

  /** Builds an empty in-memory draft from the bundled skeleton; save() creates its folder. */
  createDraft(root: string, rawName: string, canvas: Canvas, fps: number): Draft {
    const name = validateDraftName(rawName);
    const dir = path.join(root, name);
    if (fs.existsSync(dir)) {
      throw new JobError('DraftAlreadyExists', `Draft "${name}" already exists in ${root}`);
    }

    const content = { ...readSkeleton('content'), fps, canvas_config: { ratio: 'original', ...canvas } };
    const draft = parseContent(content, { name, dir, id: newId(), meta: readSkeleton('meta') });

    logger.info('TemplateStore: draft created', { name, dir, ...canvas, fps });
    return draft;
  }

  /** Contract A: copy `<root>/<templateName>` to `<root>/<draftName>`. */
  resolveByName(root: string, templateName: string, rawName: string): Draft {
    const name = validateDraftName(rawName);
    const source = path.join(root, validateDraftName(templateName));
    if (!fs.existsSync(path.join(source, DRAFT_FILES.content))) {
      throw new JobError('TemplateNotFound', `Template "${templateName}" not found in ${root}`);
    }
    return this.materialize(source, root, name, DRAFT_FILES.content);
  }

  /** Contract B: copy the folder holding `templatePath` to `<root>/<draftName>`. */
  resolveByPath(root: string, templatePath: string, rawName: string): Draft {
    const name = validateDraftName(rawName);
    const file = path.resolve(templatePath);
    if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
      throw new JobError('TemplateNotFound', `Template description not found: ${file}`);
    }
    return this.materialize(path.dirname(file), root, name, path.basename(file));
  }

  /** Parses an existing draft folder. Malformed content is TemplateCorrupt. */
  load(dir: string, name: string, contentFile: string = DRAFT_FILES.content, id?: string): Draft {
    const file = path.join(dir, contentFile);
    if (!fs.existsSync(file)) {
      throw new JobError('TemplateCorrupt', `Draft description missing: ${file}`);
    }
    const metaFile = path.join(dir, DRAFT_FILES.meta);
    try {
      const meta = fs.existsSync(metaFile) ? readJson(metaFile) : undefined;
      return parseContent(readJson(file), {
        name,
        dir,
        contentFile,
        id,
        meta: isObject(meta) ? meta : undefined,
      });
    } catch (err) {
      if (isJobError(err) && err.code === 'InvalidDraftName') throw err;
      const detail = err instanceof ZodError
        ? err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
        : err instanceof Error ? err.message : String(err);
      throw new JobError('TemplateCorrupt', `Draft description ${file} is invalid: ${detail}`, err);
    }
  }

  /** Writes the description and refreshes draft_meta_info.json. */
  save(draft: Draft): void {
    fs.mkdirSync(draft.dir, { recursive: true });
    fs.writeFileSync(
      path.join(draft.dir, draft.contentFile),
      JSON.stringify(serializeContent(draft)),
      'utf-8',
    );

    const nowMicro = Date.now() * 1000;
    const meta: Extra = {
      ...(draft.meta ?? readSkeleton('meta')),
      draft_name:        draft.name,
      draft_fold_path:   draft.dir,
      draft_root_path:   path.dirname(draft.dir),
      draft_id:          draft.id,
      tm_duration:       draft.duration,
      tm_draft_modified: nowMicro,
    };
    if (!meta['tm_draft_create']) meta['tm_draft_create'] = nowMicro;
    fs.writeFileSync(path.join(draft.dir, DRAFT_FILES.meta), JSON.stringify(meta), 'utf-8');

    logger.info('TemplateStore: draft saved', { name: draft.name, duration: draft.duration, tracks: draft.tracks.length });
  }

  private materialize(sourceDir: string, root: string, name: string, contentFile: string): Draft {
    const target = path.join(root, name);
    if (fs.existsSync(target)) {
      throw new JobError('DraftAlreadyExists', `Draft "${name}" already exists in ${root}`);
    }
    const rel = path.relative(path.resolve(sourceDir), path.resolve(target));
    if (!rel.startsWith('..') && !path.isAbsolute(rel)) {
      throw new JobError('InvalidRequest', `Cannot materialize "${name}" inside its own template folder ${sourceDir}`);
    }

    logger.info('TemplateStore: materializing template', { sourceDir, target });
    fs.cpSync(sourceDir, target, { recursive: true, errorOnExist: true, force: false });

    return this.load(target, name, contentFile, newId());
  }
}
