/**
 * Frame-count engine.
 *
 * Converts between HH:MM:SS:FF components and an absolute frame count since
 * 00:00:00:00, including drop-frame correction for the NTSC family.
 *
 * Drop-frame counting skips `k` frame labels (not video frames) at the start
 * of every minute except minutes divisible by 10: 2 labels at 29.97, 4 at
 * 59.94. The frame count is sequential, the labels have gaps.
 */

import { TimecodeError } from '../errors.js';
import type { Framerate } from '../framerate/framerate.js';

// ============================================================================
// Types
// ============================================================================

export interface TimecodeComponents {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
  readonly frames: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Frame counts are unsigned 32-bit values */
export const MAX_FRAME_COUNT = 0xffff_ffff;

/** Hours are stored in a single byte */
export const MAX_HOURS = 0xff;

/**
 * Frames per ten minutes at 29.97 DF, per dropped label:
 * (10 * 60 * 30 - 9 * 2) / 2. Scaled by `k` for other drop-frame rates.
 */
const DF_TEN_MINUTE_FRAMES_PER_DROP = 8991;

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Convert timecode components to an absolute frame count.
 *
 * @throws TimecodeError `OVERFLOW` if the count does not fit in 32 bits
 */
export function toFrameCount(tc: TimecodeComponents, framerate: Framerate): number {
  const max = framerate.maxFrame;

  let count =
    tc.hours * 3600 * max +
    tc.minutes * 60 * max +
    tc.seconds * max +
    tc.frames;

  const k = framerate.dropFrames;
  if (k !== null) {
    // Labels skipped strictly before this timestamp
    const totalMinutes = tc.hours * 60 + tc.minutes;
    const exemptMinutes = Math.floor(totalMinutes / 10);
    count -= (totalMinutes - exemptMinutes) * k;
  }

  if (count > MAX_FRAME_COUNT) {
    throw TimecodeError.overflow(`${count} exceeds ${MAX_FRAME_COUNT}`);
  }

  return count;
}

/**
 * Convert an absolute frame count to timecode components.
 *
 * @throws TimecodeError `INVALID_FRAMES` for negative or fractional counts,
 * `OVERFLOW` if the count or the resulting hours do not fit
 */
export function fromFrameCount(count: number, framerate: Framerate): TimecodeComponents {
  assertFrameCount(count);

  let frames = count;

  const k = framerate.dropFrames;
  if (k !== null) {
    // Re-insert the skipped labels before splitting into fields
    const framesPer10Minutes = k * DF_TEN_MINUTE_FRAMES_PER_DROP;
    const framesPerMinute = Math.floor(framesPer10Minutes / 10);

    const tenMinuteBlocks = Math.floor(frames / framesPer10Minutes);
    let remainder = frames % framesPer10Minutes;
    if (remainder < k) {
      remainder += k;
    }

    frames += 9 * k * tenMinuteBlocks + k * Math.floor((remainder - k) / framesPerMinute);
  }

  const max = framerate.maxFrame;

  const f = frames % max;
  frames = Math.floor(frames / max);

  const seconds = frames % 60;
  frames = Math.floor(frames / 60);

  const minutes = frames % 60;
  const hours = Math.floor(frames / 60);

  if (hours > MAX_HOURS) {
    throw TimecodeError.overflow(`${count} frames is more than ${MAX_HOURS} hours`);
  }

  return { hours, minutes, seconds, frames: f };
}

/**
 * Check that a value is a usable frame count.
 */
export function assertFrameCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw TimecodeError.invalidFrames(count, `Frame count must be a non-negative integer, got ${count}`);
  }
  if (count > MAX_FRAME_COUNT) {
    throw TimecodeError.overflow(`${count} exceeds ${MAX_FRAME_COUNT}`);
  }
}
