/**
 * Validated SMPTE timecode value.
 *
 * A `Timecode` is immutable: arithmetic and conversion return new instances.
 * Instances only come from validation or from the frame-count engine, so the
 * fields always satisfy the rules of their framerate.
 */

import { TimecodeError, type TimecodeWarning } from '../errors.js';
import {
  narrowFramerate,
  type DynFramerate,
  type Framerate,
} from '../framerate/framerate.js';
import { parseFramerate } from '../framerate/parse.js';
import { scaleFrameCount, scaleFrameCountFromStart } from './convert.js';
import {
  assertFrameCount,
  fromFrameCount,
  toFrameCount,
  type TimecodeComponents,
} from './frames.js';
import { tokenizeOrThrow, type RawTimecode } from './raw.js';
import { checkTimecode } from './rules.js';

// ============================================================================
// Types
// ============================================================================

export interface ParsedTimecode<FR extends Framerate> {
  timecode: Timecode<FR>;
  warnings: TimecodeWarning[];
}

// ============================================================================
// Timecode
// ============================================================================

export class Timecode<FR extends Framerate = Framerate> implements TimecodeComponents {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
  readonly frames: number;
  readonly framerate: FR;

  private constructor(parts: TimecodeComponents, framerate: FR) {
    this.hours = parts.hours;
    this.minutes = parts.minutes;
    this.seconds = parts.seconds;
    this.frames = parts.frames;
    this.framerate = framerate;
    Object.freeze(this);
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  /**
   * Parse and validate a timecode string.
   *
   * @throws TimecodeError `UNPARSED` or the first failed validation rule
   *
   * @example
   * Timecode.parse('01:02:00;25', DF2997).toString(); // '01:02:00;25'
   */
  static parse<FR extends Framerate>(text: string, framerate: FR): Timecode<FR> {
    return Timecode.fromRaw(tokenizeOrThrow(text), framerate);
  }

  /**
   * Parse and validate, collecting non-fatal warnings.
   *
   * @example
   * const { timecode, warnings } = Timecode.parseWithWarnings('01:02:00:25', DF2997);
   * // timecode.toString() === '01:02:00;25', warnings === ['MISMATCH_SEPARATOR']
   */
  static parseWithWarnings<FR extends Framerate>(text: string, framerate: FR): ParsedTimecode<FR> {
    const warnings: TimecodeWarning[] = [];
    const timecode = Timecode.fromRaw(tokenizeOrThrow(text), framerate, warnings);
    return { timecode, warnings };
  }

  /**
   * Parse the composite form `<timecode>@<framerate>`, e.g. "01:02:15;23@29.97".
   * Only the first `@` splits; the rest belongs to the framerate.
   */
  static parseComposite(text: string, warnings?: TimecodeWarning[]): Timecode<DynFramerate> {
    const at = text.indexOf('@');
    if (at === -1) {
      throw TimecodeError.unparsed(text);
    }
    const framerate = parseFramerate(text.slice(at + 1));
    return Timecode.fromRaw(tokenizeOrThrow(text.slice(0, at)), framerate, warnings);
  }

  /**
   * Validate tokenized fields against a framerate.
   */
  static fromRaw<FR extends Framerate>(
    raw: RawTimecode,
    framerate: FR,
    warnings?: TimecodeWarning[]
  ): Timecode<FR> {
    const error = checkTimecode(raw, framerate, warnings);
    if (error) {
      throw error;
    }
    return new Timecode(raw, framerate);
  }

  /**
   * Validate individual fields against a framerate.
   */
  static fromComponents<FR extends Framerate>(parts: TimecodeComponents, framerate: FR): Timecode<FR> {
    const error = checkTimecode(parts, framerate);
    if (error) {
      throw error;
    }
    return new Timecode(parts, framerate);
  }

  /**
   * Build the timecode at an absolute frame count.
   *
   * @example
   * Timecode.fromFrames(16184, DF2997).toString(); // '00:09:00;02'
   */
  static fromFrames<FR extends Framerate>(count: number, framerate: FR): Timecode<FR> {
    return new Timecode(fromFrameCount(count, framerate), framerate);
  }

  /**
   * Skip every validation rule.
   *
   * The caller must guarantee the SMPTE invariants for `framerate`: minutes
   * and seconds below 60, frames below `maxFrame`, and no frame inside a
   * drop-frame window. Passing fields that break them is undefined behaviour;
   * results of later arithmetic are unspecified and no error is reported.
   * The separator does not need to match.
   */
  static unchecked<FR extends Framerate>(parts: TimecodeComponents, framerate: FR): Timecode<FR> {
    return new Timecode(parts, framerate);
  }

  /**
   * Deserialize from the canonical string form, re-running parse and
   * validation.
   */
  static fromJSON<FR extends Framerate>(value: unknown, framerate: FR): Timecode<FR> {
    if (typeof value !== 'string') {
      throw TimecodeError.unparsed(String(value));
    }
    return Timecode.parse(value, framerate);
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  components(): TimecodeComponents {
    return {
      hours: this.hours,
      minutes: this.minutes,
      seconds: this.seconds,
      frames: this.frames,
    };
  }

  toFrameCount(): number {
    return toFrameCount(this, this.framerate);
  }

  /**
   * Canonical form: HH:MM:SS followed by the framerate's separator and FF.
   */
  toString(): string {
    const pad = (n: number) => n.toString().padStart(2, '0');
    return `${pad(this.hours)}:${pad(this.minutes)}:${pad(this.seconds)}${this.framerate.separator}${pad(this.frames)}`;
  }

  toCompositeString(): string {
    return `${this.toString()}@${this.framerate.toString()}`;
  }

  toJSON(): string {
    return this.toString();
  }

  // ---------------------------------------------------------------------------
  // Comparison
  // ---------------------------------------------------------------------------

  /**
   * @throws TimecodeError `FRAMERATE_MISMATCH` when framerates differ
   */
  equals(other: Timecode<FR>): boolean {
    this.assertSameFramerate(other);
    return (
      this.hours === other.hours &&
      this.minutes === other.minutes &&
      this.seconds === other.seconds &&
      this.frames === other.frames
    );
  }

  /**
   * Negative if this timecode is earlier, positive if later, zero if equal.
   */
  compare(other: Timecode<FR>): number {
    this.assertSameFramerate(other);
    return Math.sign(this.toFrameCount() - other.toFrameCount());
  }

  // ---------------------------------------------------------------------------
  // Arithmetic
  // ---------------------------------------------------------------------------

  add(other: Timecode<FR>): Timecode<FR> {
    this.assertSameFramerate(other);
    return this.addFrames(other.toFrameCount());
  }

  addFrames(frames: number): Timecode<FR> {
    assertFrameCount(frames);
    return Timecode.fromFrames(this.toFrameCount() + frames, this.framerate);
  }

  /**
   * @throws TimecodeError `UNDERFLOW` if `other` is later than this timecode
   */
  subtract(other: Timecode<FR>): Timecode<FR> {
    this.assertSameFramerate(other);
    return this.subtractFrames(other.toFrameCount());
  }

  /**
   * @throws TimecodeError `UNDERFLOW` if fewer than `frames` frames have elapsed
   */
  subtractFrames(frames: number): Timecode<FR> {
    assertFrameCount(frames);
    const count = this.toFrameCount();
    if (frames > count) {
      throw TimecodeError.underflow(count, frames);
    }
    return Timecode.fromFrames(count - frames, this.framerate);
  }

  // ---------------------------------------------------------------------------
  // Framerates
  // ---------------------------------------------------------------------------

  /**
   * Re-type this timecode with an equal framerate, e.g. a dynamic 29.97 as
   * `DF2997`.
   *
   * @throws TimecodeError `FRAMERATE_MISMATCH` if the framerates differ
   */
  withFramerate<T extends Framerate>(framerate: T): Timecode<T> {
    return new Timecode(this, narrowFramerate(this.framerate, framerate));
  }

  /**
   * Re-express this position in another framerate, counting from 00:00:00:00.
   *
   * @example
   * Timecode.parse('01:00:00:00', NDF30).convert(DF2997).toString(); // '01:00:00;00'
   */
  convert<T extends Framerate>(target: T): Timecode<T> {
    const count = scaleFrameCount(this.toFrameCount(), this.framerate, target);
    return Timecode.fromFrames(count, target);
  }

  /**
   * Re-express this position in another framerate relative to a start
   * timecode shared by both streams. The elapsed frames since `start` are
   * converted, then added to `start` converted on its own.
   *
   * @throws TimecodeError `PRECEDES_START` if this timecode is before `start`,
   * `FRAMERATE_MISMATCH` if `start` has a different framerate
   */
  convertWithStart<T extends Framerate>(start: Timecode<FR>, target: T): Timecode<T> {
    this.assertSameFramerate(start);

    const count = this.toFrameCount();
    const startCount = start.toFrameCount();
    if (count < startCount) {
      throw TimecodeError.precedesStart(this.toString(), start.toString());
    }

    return Timecode.fromFrames(
      scaleFrameCountFromStart(count, startCount, this.framerate, target),
      target
    );
  }

  private assertSameFramerate(other: Timecode<Framerate>): void {
    if (!this.framerate.equals(other.framerate)) {
      throw TimecodeError.framerateMismatch(
        this.framerate.toString(),
        other.framerate.toString()
      );
    }
  }
}
