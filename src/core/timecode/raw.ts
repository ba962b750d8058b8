/**
 * Tokenizer for SMPTE timecode strings.
 *
 * Splits "HH:MM:SS:FF" / "HH:MM:SS;FF" into raw fields without checking them
 * against any framerate. Range and drop-frame rules live in the validator.
 */

import { TimecodeError } from '../errors.js';
import type { Separator } from '../framerate/framerate.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Structurally well-formed timecode fields, not yet range-checked.
 */
export interface RawTimecode {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
  readonly frames: number;
  readonly separator: Separator;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Hours, minutes and seconds take 2-3 digits, frames 2 or more.
 * No leading or trailing characters are allowed.
 */
const TIMECODE_REGEX = /^(\d{2,3}):(\d{2,3}):(\d{2,3})([:;])(\d{2,})$/;

const MAX_FIELD = 0xff;
const MAX_FRAMES_FIELD = 0xffff_ffff;

// ============================================================================
// Tokenizing
// ============================================================================

/**
 * Split a timecode string into raw fields.
 *
 * @returns Raw fields, or null if the string is not a timecode
 *
 * @example
 * tokenize('01:23:12;22');
 * // { hours: 1, minutes: 23, seconds: 12, frames: 22, separator: ';' }
 * tokenize('01:23:12;22 ok'); // null
 */
export function tokenize(input: string): RawTimecode | null {
  const match = TIMECODE_REGEX.exec(input);
  if (!match) {
    return null;
  }

  const [, hoursStr, minutesStr, secondsStr, separator, framesStr] = match;
  if (
    hoursStr === undefined ||
    minutesStr === undefined ||
    secondsStr === undefined ||
    framesStr === undefined ||
    (separator !== ':' && separator !== ';')
  ) {
    return null;
  }

  const hours = parseInt(hoursStr, 10);
  const minutes = parseInt(minutesStr, 10);
  const seconds = parseInt(secondsStr, 10);
  const frames = Number(framesStr);

  // Hours, minutes and seconds fit in a byte, frames in 32 bits
  if (hours > MAX_FIELD || minutes > MAX_FIELD || seconds > MAX_FIELD) {
    return null;
  }
  if (frames > MAX_FRAMES_FIELD) {
    return null;
  }

  return { hours, minutes, seconds, frames, separator };
}

/**
 * Like `tokenize`, but throws `UNPARSED` instead of returning null.
 */
export function tokenizeOrThrow(input: string): RawTimecode {
  const raw = tokenize(input);
  if (!raw) {
    throw TimecodeError.unparsed(input);
  }
  return raw;
}
