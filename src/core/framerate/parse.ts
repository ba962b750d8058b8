/**
 * Framerate parsing from user-facing text such as "25", "29.97" or "23.98".
 *
 * The mapping from decimals to descriptors is a heuristic: whole numbers
 * (within 0.01) are non-drop, a short table covers the common NTSC rates, and
 * anything close to a multiple of 29.97 is treated as drop-frame at the
 * matching multiple of 30. Rates outside those cases are rejected.
 */

import { TimecodeError } from '../errors.js';
import {
  DF2997,
  DF5994,
  NDF2398,
  createFramerate,
  type DynFramerate,
} from './framerate.js';

// ============================================================================
// Constants
// ============================================================================

const EPSILON = 0.01;

const NTSC_BASE_RATE = 29.97;

const INTEGER_REGEX = /^\d+$/;
const DECIMAL_REGEX = /^(\d+\.\d*|\.\d+)$/;

const SPECIAL_RATES: ReadonlyArray<readonly [number, DynFramerate]> = [
  [23.98, NDF2398],
  [29.97, DF2997],
  [59.94, DF5994],
  [59.97, DF5994],
];

// ============================================================================
// Parsing
// ============================================================================

/**
 * Interpret a framerate string (or number).
 *
 * @throws TimecodeError `INVALID_FRAMERATE` carrying the raw input
 *
 * @example
 * parseFramerate('25');     // NonDropFrame(25)
 * parseFramerate('25.00');  // NonDropFrame(25)
 * parseFramerate('29.97');  // DropFrame(30)
 * parseFramerate('239.76'); // DropFrame(240)
 */
export function parseFramerate(input: string | number): DynFramerate {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input <= 0) {
      throw TimecodeError.invalidFramerate(input);
    }
    return Number.isInteger(input)
      ? createFramerate(input, false)
      : fromDecimal(input, input);
  }

  const text = input.trim();

  if (INTEGER_REGEX.test(text)) {
    const count = parseInt(text, 10);
    if (count === 0) {
      throw TimecodeError.invalidFramerate(input);
    }
    return createFramerate(count, false);
  }

  if (DECIMAL_REGEX.test(text)) {
    return fromDecimal(parseFloat(text), input);
  }

  throw TimecodeError.invalidFramerate(input);
}

/**
 * Non-throwing variant of `parseFramerate`.
 */
export function tryParseFramerate(input: string | number): DynFramerate | null {
  try {
    return parseFramerate(input);
  } catch (error) {
    if (error instanceof TimecodeError) {
      return null;
    }
    throw error;
  }
}

function fromDecimal(value: number, raw: string | number): DynFramerate {
  const whole = Math.round(value);
  if (Math.abs(value - whole) < EPSILON) {
    if (whole === 0) {
      throw TimecodeError.invalidFramerate(raw);
    }
    return createFramerate(whole, false);
  }

  for (const [rate, framerate] of SPECIAL_RATES) {
    if (Math.abs(value - rate) < EPSILON) {
      return framerate;
    }
  }

  // Close to a multiple of 29.97: drop-frame at the same multiple of 30
  const multiple = value / NTSC_BASE_RATE;
  const k = Math.round(multiple);
  if (k >= 1 && Math.abs(multiple - k) < EPSILON) {
    return createFramerate(k * 30, true);
  }

  throw TimecodeError.invalidFramerate(raw);
}
