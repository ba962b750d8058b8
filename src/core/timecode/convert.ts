/**
 * Framerate conversion of frame counts.
 *
 * Counts are rescaled with exact rational arithmetic:
 *
 *   target = floor(count * targetNum * sourceDen / (targetDen * sourceNum))
 *
 * Intermediates are bigint, since a 30000/1001 numerator times a frame count
 * in the millions is past 2^53.
 */

import { TimecodeError } from '../errors.js';
import type { Framerate } from '../framerate/framerate.js';
import { MAX_FRAME_COUNT, assertFrameCount } from './frames.js';

/**
 * Re-express a frame count from one framerate in another.
 *
 * @throws TimecodeError `OVERFLOW` if the result does not fit in 32 bits
 */
export function scaleFrameCount(count: number, source: Framerate, target: Framerate): number {
  assertFrameCount(count);

  const numerator =
    BigInt(count) * BigInt(target.numerator) * BigInt(source.denominator);
  const denominator = BigInt(target.denominator) * BigInt(source.numerator);

  // Both operands are non-negative, so bigint division floors
  const scaled = numerator / denominator;

  if (scaled > BigInt(MAX_FRAME_COUNT)) {
    throw TimecodeError.overflow(
      `${count} frames at ${source.toString()} fps is out of range at ${target.toString()} fps`
    );
  }

  return Number(scaled);
}

/**
 * Convert a frame count relative to a start point shared by both streams.
 *
 * The elapsed frames since `startCount` are rescaled, then added to the start
 * point rescaled on its own. Anchoring at the start keeps material that began
 * at a non-zero timecode aligned after conversion.
 *
 * @throws TimecodeError `PRECEDES_START` if `count` is before `startCount`
 */
export function scaleFrameCountFromStart(
  count: number,
  startCount: number,
  source: Framerate,
  target: Framerate
): number {
  if (count < startCount) {
    throw TimecodeError.precedesStart(String(count), String(startCount));
  }

  const elapsed = scaleFrameCount(count - startCount, source, target);
  const start = scaleFrameCount(startCount, source, target);
  const total = elapsed + start;

  if (total > MAX_FRAME_COUNT) {
    throw TimecodeError.overflow(`${total} exceeds ${MAX_FRAME_COUNT}`);
  }

  return total;
}
