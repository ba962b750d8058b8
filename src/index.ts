/**
 * smpte-frames
 *
 * SMPTE timecode parsing, validation, frame counts and framerate conversion,
 * with drop-frame support for the 29.97 / 59.94 family.
 *
 * @example
 * ```typescript
 * import { Timecode, DF2997, NDF30 } from 'smpte-frames';
 *
 * const tc = Timecode.parse('00:08:59;29', DF2997);
 * tc.addFrames(1).toString();                                        // '00:09:00;02'
 * Timecode.parse('01:00:00:00', NDF30).convert(DF2997).toString();  // '01:00:00;00'
 * ```
 *
 * @module smpte-frames
 */

// ============================================================================
// Errors
// ============================================================================

export {
  TimecodeError,
  isTimecodeError,
  type TimecodeErrorCode,
  type TimecodeWarning,
} from './core/errors.js';

// ============================================================================
// Framerates
// ============================================================================

export {
  DropFrame,
  NonDropFrame,
  DF2997,
  DF5994,
  NDF2398,
  NDF24,
  NDF25,
  NDF30,
  NDF50,
  NDF60,
  createFramerate,
  narrowFramerate,
  isValidDropFrameCount,
  isValidFrameCount,
  type DynFramerate,
  type Framerate,
  type FramerateKind,
  type Separator,
} from './core/framerate/framerate.js';

export { parseFramerate, tryParseFramerate } from './core/framerate/parse.js';

// ============================================================================
// Timecodes
// ============================================================================

export { tokenize, tokenizeOrThrow, type RawTimecode } from './core/timecode/raw.js';

export {
  MAX_FRAME_COUNT,
  MAX_HOURS,
  fromFrameCount,
  toFrameCount,
  type TimecodeComponents,
} from './core/timecode/frames.js';

export { Timecode, type ParsedTimecode } from './core/timecode/timecode.js';

export {
  safeParseTimecode,
  validate,
  validateWithWarnings,
  type ValidationResult,
} from './core/timecode/validate.js';

export { scaleFrameCount, scaleFrameCountFromStart } from './core/timecode/convert.js';

export {
  compositeTimecodeSchema,
  framerateSchema,
  timecodeSchema,
} from './core/timecode/schema.js';
