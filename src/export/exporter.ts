/**
 * Export boundary. Rendering happens in the external editor; this module only
 * checks what it is about to hand over and runs the configured export command.
 */
import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { env, OUTPUT_EXTENSION, SUPPORTED_EXPORT_FPS, type ExportFps, type ExportResolution } from '../config.js';
import { logger } from '../utils/logger.js';
import { JobError } from '../utils/errors.js';

const execFileAsync = promisify(execFile);

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Exporter {
  export(draftName: string, outputPath: string, fps: ExportFps): Promise<void>;
}

export interface CommandExporterOptions {
  resolution: ExportResolution;
  timeoutMs: number;
}

// ── Checks ────────────────────────────────────────────────────────────────────

export const isExportFps = (fps: number): fps is ExportFps => SUPPORTED_EXPORT_FPS.some(f => f === fps);

export function assertExportFps(fps: number): ExportFps {
  if (!isExportFps(fps)) {
    throw new JobError('UnsupportedFrameRate', `Export at ${fps}fps is not supported; use one of ${SUPPORTED_EXPORT_FPS.join(', ')}`);
  }
  return fps;
}

export function validateOutputPath(outputPath: string): string {
  const absolute = path.resolve(outputPath);
  if (path.extname(absolute).toLowerCase() !== OUTPUT_EXTENSION) {
    throw new JobError('InvalidOutputPath', `Output path must end in ${OUTPUT_EXTENSION}: ${absolute}`);
  }
  return absolute;
}

/** Creates the parent directory and removes a previous render at the path. */
export function prepareOutputPath(outputPath: string): string {
  const absolute = validateOutputPath(outputPath);
  fs.mkdirSync(path.dirname(absolute), { recursive: true });
  if (fs.existsSync(absolute)) {
    logger.info('Export: removing previous output', { outputPath: absolute });
    fs.unlinkSync(absolute);
  }
  return absolute;
}

// ── Command exporter ──────────────────────────────────────────────────────────

/**
 * Runs `<command> <draftName> <outputPath> <fps> <resolution>`. The command
 * string is split on whitespace into the binary and its leading arguments.
 */
export class CommandExporter implements Exporter {
  private readonly binary: string;
  private readonly baseArgs: string[];

  constructor(command: string, private readonly options: CommandExporterOptions) {
    const [binary, ...baseArgs] = command.trim().split(/\s+/);
    if (!binary) throw new Error('Export command is empty');
    this.binary = binary;
    this.baseArgs = baseArgs;
  }

  async export(draftName: string, outputPath: string, fps: ExportFps): Promise<void> {
    const args = [...this.baseArgs, draftName, outputPath, String(fps), this.options.resolution];
    logger.info('Export: starting', { draftName, outputPath, fps, resolution: this.options.resolution });
    try {
      await execFileAsync(this.binary, args, { timeout: this.options.timeoutMs, windowsHide: true });
    } catch (err) {
      const e = err as { stderr?: Buffer | string; message?: string };
      const stderr = e.stderr ? String(e.stderr).trim() : '';
      throw new JobError('ExportFailed', `Export of draft "${draftName}" failed: ${stderr || e.message || String(err)}`, err);
    }
    logger.info('Export: complete', { draftName, outputPath });
  }
}

/** The configured exporter, or undefined when EXPORT_COMMAND is unset. */
export function createExporter(): Exporter | undefined {
  if (!env.EXPORT_COMMAND) return undefined;
  return new CommandExporter(env.EXPORT_COMMAND, {
    resolution: env.EXPORT_RESOLUTION,
    timeoutMs:  env.EXPORT_TIMEOUT_MS,
  });
}
