/**
 * Framerate descriptors.
 *
 * A framerate is described by its frame separator, the exclusive upper bound
 * of the frames field, the number of frame labels skipped per drop-frame
 * minute, and an exact numerator/denominator pair.
 *
 * Two flavours share the `Framerate` interface:
 * - Fixed: `NonDropFrame<30>`, `DropFrame<30>`, ... where the frame count is
 *   part of the type, so timecodes of different rates do not type-check
 *   against each other.
 * - Dynamic: `DynFramerate`, the union of both classes over `number`, built
 *   at runtime from configuration or user input.
 */

import { TimecodeError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export type Separator = ':' | ';';

export type FramerateKind = 'ndf' | 'df';

export interface Framerate {
  readonly kind: FramerateKind;

  /** Canonical separator between seconds and frames */
  readonly separator: Separator;

  /** Exclusive upper bound of the frames field */
  readonly maxFrame: number;

  /**
   * Frame labels skipped at the start of each non-exempt minute.
   * Null for non-drop framerates.
   */
  readonly dropFrames: number | null;

  readonly numerator: number;
  readonly denominator: number;

  /** numerator / denominator, for display only */
  ratio(): number;
  isDropFrame(): boolean;
  equals(other: Framerate): boolean;
  toString(): string;
}

// ============================================================================
// Invariants
// ============================================================================

/**
 * Drop-frame timecode only exists for the NTSC family built from multiples
 * of 29.97, so the nominal count has to be a multiple of 30.
 */
export function isValidDropFrameCount(count: number): boolean {
  return isValidFrameCount(count) && count % 30 === 0;
}

export function isValidFrameCount(count: number): boolean {
  return Number.isSafeInteger(count) && count > 0;
}

// ============================================================================
// Descriptors
// ============================================================================

export class NonDropFrame<N extends number = number> implements Framerate {
  readonly kind = 'ndf';
  readonly separator = ':';
  readonly dropFrames = null;
  readonly denominator = 1;
  readonly maxFrame: N;

  /**
   * @throws RangeError when the count is not a positive integer. Use
   * `createFramerate` for counts that come from user input.
   */
  constructor(maxFrame: N) {
    if (!isValidFrameCount(maxFrame)) {
      throw new RangeError(`Framerate must be a positive integer, got ${maxFrame}`);
    }
    this.maxFrame = maxFrame;
  }

  get numerator(): number {
    return this.maxFrame;
  }

  ratio(): number {
    return this.numerator / this.denominator;
  }

  isDropFrame(): boolean {
    return false;
  }

  equals(other: Framerate): boolean {
    return other.kind === this.kind && other.maxFrame === this.maxFrame;
  }

  toString(): string {
    return String(this.maxFrame);
  }
}

export class DropFrame<N extends number = number> implements Framerate {
  readonly kind = 'df';
  readonly separator = ';';
  readonly denominator = 1001;
  readonly maxFrame: N;
  readonly dropFrames: number;

  /**
   * @throws RangeError when the count is not a multiple of 30. Use
   * `createFramerate` for counts that come from user input.
   */
  constructor(maxFrame: N) {
    if (!isValidDropFrameCount(maxFrame)) {
      throw new RangeError(
        `Framerate for drop-frame timecodes must be a multiple of 30, got ${maxFrame}`
      );
    }
    this.maxFrame = maxFrame;
    // 30 -> 2, 60 -> 4, ...
    this.dropFrames = maxFrame / 15;
  }

  get numerator(): number {
    return this.maxFrame * 1000;
  }

  ratio(): number {
    return this.numerator / this.denominator;
  }

  isDropFrame(): boolean {
    return true;
  }

  equals(other: Framerate): boolean {
    return other.kind === this.kind && other.maxFrame === this.maxFrame;
  }

  toString(): string {
    return this.ratio().toFixed(2);
  }
}

/**
 * A framerate chosen at runtime. Fixed descriptors are members of this union.
 */
export type DynFramerate = NonDropFrame | DropFrame;

// ============================================================================
// Well-known Framerates
// ============================================================================

/** 29.97 drop-frame (NTSC) */
export const DF2997 = new DropFrame(30);
/** 59.94 drop-frame */
export const DF5994 = new DropFrame(60);
/** 23.98 counted as 24 frames per second */
export const NDF2398 = new NonDropFrame(24);
export const NDF24 = new NonDropFrame(24);
/** 25 (PAL) */
export const NDF25 = new NonDropFrame(25);
export const NDF30 = new NonDropFrame(30);
/** 50 (PAL) */
export const NDF50 = new NonDropFrame(50);
export const NDF60 = new NonDropFrame(60);

// ============================================================================
// Dynamic Construction
// ============================================================================

/**
 * Build a framerate from a runtime frame count.
 *
 * @throws TimecodeError `INVALID_FRAMERATE` if the count is not a positive
 * integer, or not a multiple of 30 for drop-frame.
 */
export function createFramerate(count: number, dropFrame: boolean): DynFramerate {
  if (dropFrame) {
    if (!isValidDropFrameCount(count)) {
      throw TimecodeError.invalidFramerate(count);
    }
    return new DropFrame(count);
  }

  if (!isValidFrameCount(count)) {
    throw TimecodeError.invalidFramerate(count);
  }
  return new NonDropFrame(count);
}

/**
 * Narrow a runtime framerate to a matching fixed one.
 *
 * @example
 * const fr = narrowFramerate(parseFramerate('29.97'), DF2997); // DropFrame<30>
 */
export function narrowFramerate<F extends Framerate>(value: Framerate, expected: F): F {
  if (!value.equals(expected)) {
    throw TimecodeError.framerateMismatch(value.toString(), expected.toString());
  }
  return expected;
}
