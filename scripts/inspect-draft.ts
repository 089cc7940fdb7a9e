#!/usr/bin/env tsx
/**
 * Prints the tracks, segments and materials of a draft.
 * Run: npm run inspect-draft -- <draft folder | draft name under DRAFTS_ROOT>
 *
 * Exit codes:
 *   0: draft parsed
 *   1: draft missing or unreadable
 */
import { existsSync } from 'fs';
import { basename, join, resolve } from 'path';
import { env } from '../src/config.js';
import { TemplateStore } from '../src/draft/store.js';
import { end, unitsToSeconds } from '../src/draft/timerange.js';
import { isJobError } from '../src/utils/errors.js';

const BOLD   = '\x1b[1m';
const CYAN   = '\x1b[36m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const RESET  = '\x1b[0m';

const secs = (us: number) => `${unitsToSeconds(us).toFixed(3)}s`;

const [,, target] = process.argv;
if (!target) {
  console.error(`${RED}Usage: npm run inspect-draft -- <draft folder | draft name>${RESET}`);
  process.exit(1);
}

const dir = existsSync(target) ? resolve(target) : env.DRAFTS_ROOT ? join(env.DRAFTS_ROOT, target) : resolve(target);

try {
  const draft = new TemplateStore().load(dir, basename(dir));

  console.log(`\n${BOLD}${draft.name}${RESET}  ${YELLOW}${draft.dir}${RESET}`);
  console.log(`  canvas ${draft.canvas.width}x${draft.canvas.height} @ ${draft.fps}fps, duration ${secs(draft.duration)}\n`);

  draft.tracks.forEach((track, t) => {
    console.log(`${BOLD}[${t}] ${track.type}${RESET} ${CYAN}${track.name}${RESET}  (${track.length} segment(s), ends ${secs(track.end)})`);
    track.segments.forEach((seg, i) => {
      const material = draft.getMaterial(seg.materialId);
      const source = seg.source ? ` src [${secs(seg.source.start)}, ${secs(end(seg.source))})` : '';
      const label = material ? basename(material.path) : `${RED}missing material ${seg.materialId}${RESET}`;
      console.log(`    ${i}: [${secs(seg.target.start)}, ${secs(end(seg.target))})${source}  ${label}`);
    });
  });

  console.log(`\n${BOLD}Materials${RESET} (${draft.materials.length})`);
  for (const m of draft.materials) {
    const present = m.path !== '' && existsSync(m.path);
    console.log(`  ${present ? ' ' : `${RED}!${RESET}`} ${m.kind.padEnd(5)} ${secs(m.duration).padStart(10)}  ${m.path || '(no path)'}`);
  }
  console.log('');
} catch (err) {
  const msg = isJobError(err) ? `${err.code}: ${err.message}` : err instanceof Error ? err.message : String(err);
  console.error(`${RED}${msg}${RESET}`);
  process.exit(1);
}
