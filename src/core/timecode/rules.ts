/**
 * SMPTE validation rules for raw timecode fields against a framerate.
 */

import { TimecodeError, type TimecodeWarning } from '../errors.js';
import type { Framerate, Separator } from '../framerate/framerate.js';
import { MAX_HOURS, type TimecodeComponents } from './frames.js';

/**
 * Check raw fields against a framerate. The first failing rule wins:
 * minutes, seconds, drop-frame window, frame range, hours.
 *
 * A separator that does not match the framerate is only reported as a
 * warning, only when a `warnings` array is passed, and only once every rule
 * has passed.
 *
 * @returns The error for the first failed rule, or null if the fields are valid
 */
export function checkTimecode(
  raw: TimecodeComponents & { readonly separator?: Separator },
  framerate: Framerate,
  warnings?: TimecodeWarning[]
): TimecodeError | null {
  const { minutes, seconds, frames } = raw;

  if (!isField(minutes) || minutes >= 60) {
    return TimecodeError.invalidMinutes(minutes);
  }

  if (!isField(seconds) || seconds >= 60) {
    return TimecodeError.invalidSeconds(seconds);
  }

  if (!isField(frames)) {
    return TimecodeError.invalidFrames(frames);
  }

  const k = framerate.dropFrames;
  if (k !== null && isDroppedLabel(minutes, seconds, frames, k)) {
    return TimecodeError.invalidFrames(
      frames,
      `Drop-frame timecode is invalid: frames 0-${k - 1} are skipped at minute ${minutes}`
    );
  }

  if (frames >= framerate.maxFrame) {
    return TimecodeError.invalidFrames(
      frames,
      `Frames must be 0-${framerate.maxFrame - 1}, got ${frames}`
    );
  }

  if (!isField(raw.hours) || raw.hours > MAX_HOURS) {
    return TimecodeError.overflow(`hours must be 0-${MAX_HOURS}, got ${raw.hours}`);
  }

  if (warnings && raw.separator !== undefined && raw.separator !== framerate.separator) {
    warnings.push('MISMATCH_SEPARATOR');
  }

  return null;
}

/**
 * Drop-frame rules are the same at every rate: the first `k` labels of each
 * minute not divisible by 10 never occur.
 */
export function isDroppedLabel(minutes: number, seconds: number, frames: number, k: number): boolean {
  return minutes % 10 !== 0 && seconds === 0 && frames < k;
}

function isField(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
