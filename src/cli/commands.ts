/**
 * Command implementations for the CLI.
 *
 * Each command resolves its inputs, runs one library operation and returns a
 * plain report object. Printing and logging happen in the CLI layer.
 */

import { TimecodeError, type TimecodeWarning } from '../core/errors.js';
import type { DynFramerate, Framerate } from '../core/framerate/framerate.js';
import { parseFramerate } from '../core/framerate/parse.js';
import type { OutputFormat } from '../core/config/schema.js';
import { Timecode } from '../core/timecode/timecode.js';

// ============================================================================
// Types
// ============================================================================

export interface TimecodeReport {
  timecode: string;
  framerate: string;
  dropFrame: boolean;
  frameCount: number;
  hours: number;
  minutes: number;
  seconds: number;
  frames: number;
  warnings: TimecodeWarning[];
}

export interface FramerateReport {
  framerate: string;
  ratio: number;
  numerator: number;
  denominator: number;
  maxFrame: number;
  dropFrames: number | null;
  separator: string;
}

export interface ConvertOptions {
  to: string;
  start?: string;
}

// ============================================================================
// Input Resolution
// ============================================================================

const FRAME_COUNT_REGEX = /^\d+$/;

/**
 * Read a timecode argument. A "<timecode>@<framerate>" argument carries its
 * own framerate; anything else is read at `framerate`.
 */
export function resolveTimecode(
  input: string,
  framerate: DynFramerate,
  warnings?: TimecodeWarning[]
): Timecode<DynFramerate> {
  if (input.includes('@')) {
    return Timecode.parseComposite(input, warnings);
  }
  const parsed = Timecode.parseWithWarnings(input, framerate);
  warnings?.push(...parsed.warnings);
  return parsed.timecode;
}

export function parseFrameCount(input: string): number {
  if (!FRAME_COUNT_REGEX.test(input)) {
    throw TimecodeError.invalidFrames(
      Number.NaN,
      `Frame count must be a non-negative integer, got ${input}`
    );
  }
  return Number(input);
}

// ============================================================================
// Commands
// ============================================================================

export function parseCommand(input: string, framerate: DynFramerate): TimecodeReport {
  const warnings: TimecodeWarning[] = [];
  const timecode = resolveTimecode(input, framerate, warnings);
  return toReport(timecode, warnings);
}

export function fromFramesCommand(count: string, framerate: DynFramerate): TimecodeReport {
  return toReport(Timecode.fromFrames(parseFrameCount(count), framerate));
}

/**
 * Add a timecode or a frame count to a timecode.
 */
export function addCommand(input: string, operand: string, framerate: DynFramerate): TimecodeReport {
  const warnings: TimecodeWarning[] = [];
  const timecode = resolveTimecode(input, framerate, warnings);

  const result = FRAME_COUNT_REGEX.test(operand)
    ? timecode.addFrames(parseFrameCount(operand))
    : timecode.add(resolveTimecode(operand, timecode.framerate, warnings));

  return toReport(result, warnings);
}

/**
 * Subtract a timecode or a frame count from a timecode.
 */
export function subtractCommand(input: string, operand: string, framerate: DynFramerate): TimecodeReport {
  const warnings: TimecodeWarning[] = [];
  const timecode = resolveTimecode(input, framerate, warnings);

  const result = FRAME_COUNT_REGEX.test(operand)
    ? timecode.subtractFrames(parseFrameCount(operand))
    : timecode.subtract(resolveTimecode(operand, timecode.framerate, warnings));

  return toReport(result, warnings);
}

export function convertCommand(
  input: string,
  options: ConvertOptions,
  framerate: DynFramerate
): TimecodeReport {
  const warnings: TimecodeWarning[] = [];
  const timecode = resolveTimecode(input, framerate, warnings);
  const target = parseFramerate(options.to);

  const result = options.start === undefined
    ? timecode.convert(target)
    : timecode.convertWithStart(resolveTimecode(options.start, timecode.framerate, warnings), target);

  return toReport(result, warnings);
}

export function infoCommand(input: string): FramerateReport {
  const framerate = parseFramerate(input);
  return {
    framerate: framerate.toString(),
    ratio: Number(framerate.ratio().toFixed(3)),
    numerator: framerate.numerator,
    denominator: framerate.denominator,
    maxFrame: framerate.maxFrame,
    dropFrames: framerate.dropFrames,
    separator: framerate.separator,
  };
}

// ============================================================================
// Output
// ============================================================================

export function toReport(timecode: Timecode<Framerate>, warnings: TimecodeWarning[] = []): TimecodeReport {
  return {
    timecode: timecode.toString(),
    framerate: timecode.framerate.toString(),
    dropFrame: timecode.framerate.isDropFrame(),
    frameCount: timecode.toFrameCount(),
    ...timecode.components(),
    warnings,
  };
}

export function formatTimecodeReport(report: TimecodeReport, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2);
  }
  return `${report.timecode} @ ${report.framerate} fps (${report.frameCount} frames)`;
}

export function formatFramerateReport(report: FramerateReport, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2);
  }
  const mode = report.dropFrames === null
    ? 'non-drop'
    : `drop-frame, ${report.dropFrames} labels skipped per minute`;
  return `${report.framerate} fps = ${report.numerator}/${report.denominator} (${report.maxFrame} frames per second, ${mode})`;
}
