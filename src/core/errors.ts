/**
 * Error taxonomy for timecode parsing, validation and arithmetic.
 *
 * Every fallible operation in the core reports one of these codes. Nothing in
 * the core exits the process; callers decide how to surface the error.
 */

// ============================================================================
// Types
// ============================================================================

export type TimecodeErrorCode =
  | 'UNPARSED'            // Input did not match HH:MM:SS:FF at all
  | 'INVALID_MINUTES'     // Minutes field out of range
  | 'INVALID_SECONDS'     // Seconds field out of range
  | 'INVALID_FRAMES'      // Frames out of range, or inside a drop-frame window
  | 'INVALID_FRAMERATE'   // Framerate text or count could not be interpreted
  | 'FRAMERATE_MISMATCH'  // Two timecodes with different framerates were combined
  | 'OVERFLOW'            // A frame count exceeded the representable range
  | 'UNDERFLOW'           // Subtraction would give a negative frame count
  | 'PRECEDES_START';     // Start-relative conversion with timecode before start

/**
 * Non-fatal findings collected by the validator on request.
 */
export type TimecodeWarning = 'MISMATCH_SEPARATOR';

// ============================================================================
// Error Class
// ============================================================================

export class TimecodeError extends Error {
  readonly code: TimecodeErrorCode;
  readonly value: string | number | undefined;

  constructor(code: TimecodeErrorCode, message: string, value?: string | number) {
    super(message);
    this.name = 'TimecodeError';
    this.code = code;
    this.value = value;
  }

  static unparsed(input: string): TimecodeError {
    return new TimecodeError(
      'UNPARSED',
      `Invalid timecode format: ${input}. Expected HH:MM:SS:FF or HH:MM:SS;FF`,
      input
    );
  }

  static invalidMinutes(minutes: number): TimecodeError {
    return new TimecodeError('INVALID_MINUTES', `Minutes must be 0-59, got ${minutes}`, minutes);
  }

  static invalidSeconds(seconds: number): TimecodeError {
    return new TimecodeError('INVALID_SECONDS', `Seconds must be 0-59, got ${seconds}`, seconds);
  }

  static invalidFrames(frames: number, detail?: string): TimecodeError {
    return new TimecodeError(
      'INVALID_FRAMES',
      detail ?? `Invalid frame value ${frames}`,
      frames
    );
  }

  static invalidFramerate(raw?: string | number): TimecodeError {
    const message = raw === undefined
      ? 'Invalid framerate'
      : `Invalid framerate: ${raw}`;
    return new TimecodeError('INVALID_FRAMERATE', message, raw);
  }

  static framerateMismatch(left: string, right: string): TimecodeError {
    return new TimecodeError(
      'FRAMERATE_MISMATCH',
      `Framerate mismatch: ${left} fps and ${right} fps cannot be combined`
    );
  }

  static overflow(detail: string): TimecodeError {
    return new TimecodeError('OVERFLOW', `Frame count overflow: ${detail}`);
  }

  static underflow(available: number, requested: number): TimecodeError {
    return new TimecodeError(
      'UNDERFLOW',
      `Cannot subtract ${requested} frames from ${available}: result would be negative timecode`,
      requested
    );
  }

  static precedesStart(timecode: string, start: string): TimecodeError {
    return new TimecodeError(
      'PRECEDES_START',
      `Timecode ${timecode} precedes start ${start}`,
      timecode
    );
  }
}

/**
 * Type guard for errors raised by this library.
 */
export function isTimecodeError(error: unknown): error is TimecodeError {
  return error instanceof TimecodeError;
}
