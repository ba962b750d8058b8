/**
 * Result-returning validation API.
 *
 * Mirrors the safe-parse style: callers get a discriminated union instead of
 * an exception. `validate` skips the separator check entirely;
 * `validateWithWarnings` reports it.
 */

import { TimecodeError, type TimecodeWarning } from '../errors.js';
import type { Framerate } from '../framerate/framerate.js';
import { tokenize, type RawTimecode } from './raw.js';
import { checkTimecode } from './rules.js';
import { Timecode } from './timecode.js';

// ============================================================================
// Types
// ============================================================================

export type ValidationResult<FR extends Framerate> =
  | {
      success: true;
      timecode: Timecode<FR>;
      warnings: readonly TimecodeWarning[];
    }
  | {
      success: false;
      error: TimecodeError;
    };

// ============================================================================
// Validation
// ============================================================================

/**
 * Check raw fields against a framerate.
 */
export function validate<FR extends Framerate>(raw: RawTimecode, framerate: FR): ValidationResult<FR> {
  const error = checkTimecode(raw, framerate);
  if (error) {
    return { success: false, error };
  }
  return { success: true, timecode: Timecode.unchecked(raw, framerate), warnings: [] };
}

/**
 * Check raw fields against a framerate, collecting warnings such as a
 * `:` separator on a drop-frame timecode.
 */
export function validateWithWarnings<FR extends Framerate>(
  raw: RawTimecode,
  framerate: FR
): ValidationResult<FR> {
  const warnings: TimecodeWarning[] = [];
  const error = checkTimecode(raw, framerate, warnings);
  if (error) {
    return { success: false, error };
  }
  return { success: true, timecode: Timecode.unchecked(raw, framerate), warnings };
}

/**
 * Tokenize and validate a string without throwing.
 */
export function safeParseTimecode<FR extends Framerate>(
  text: string,
  framerate: FR,
  options: { warnings?: boolean } = {}
): ValidationResult<FR> {
  const raw = tokenize(text);
  if (!raw) {
    return { success: false, error: TimecodeError.unparsed(text) };
  }
  return options.warnings
    ? validateWithWarnings(raw, framerate)
    : validate(raw, framerate);
}
