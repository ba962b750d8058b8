/**
 * Timecode value tests.
 */

import { describe, it, expect } from 'vitest';
import { Timecode } from '../src/core/timecode/timecode.js';
import { MAX_FRAME_COUNT } from '../src/core/timecode/frames.js';
import {
  DF2997,
  NDF25,
  NDF30,
  NonDropFrame,
  type Framerate,
} from '../src/core/framerate/framerate.js';
import { TimecodeError } from '../src/core/errors.js';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TimecodeError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

function addOneFrame(input: string, framerate: Framerate): string {
  return Timecode.parse(input, framerate).addFrames(1).toString();
}

describe('Timecode.parse', () => {
  it('parses non-drop-frame timecode', () => {
    const tc = Timecode.parse('01:02:03:04', NDF30);
    expect(tc.components()).toEqual({ hours: 1, minutes: 2, seconds: 3, frames: 4 });
    expect(tc.hours).toBe(1);
    expect(tc.minutes).toBe(2);
    expect(tc.seconds).toBe(3);
    expect(tc.frames).toBe(4);
  });

  it('parses drop-frame timecode', () => {
    const tc = Timecode.parse('01:02:03;04', DF2997);
    expect(tc.components()).toEqual({ hours: 1, minutes: 2, seconds: 3, frames: 4 });
    expect(tc.framerate).toBe(DF2997);
  });

  it('throws on invalid format', () => {
    expect(errorCode(() => Timecode.parse('invalid', NDF30))).toBe('UNPARSED');
    expect(errorCode(() => Timecode.parse('1:2:3:4', NDF30))).toBe('UNPARSED');
    expect(errorCode(() => Timecode.parse('01:02:03', NDF30))).toBe('UNPARSED');
  });

  it('returns warnings from parseWithWarnings', () => {
    const { timecode, warnings } = Timecode.parseWithWarnings('01:02:00:25', DF2997);
    expect(timecode.toString()).toBe('01:02:00;25');
    expect(warnings).toEqual(['MISMATCH_SEPARATOR']);
  });

  it('is immutable', () => {
    expect(Object.isFrozen(Timecode.parse('01:02:03:04', NDF30))).toBe(true);
  });
});

describe('toString', () => {
  it('formats non-drop-frame timecode', () => {
    expect(Timecode.parse('01:02:03:04', NDF30).toString()).toBe('01:02:03:04');
  });

  it('formats drop-frame timecode', () => {
    expect(Timecode.parse('01:02:03;04', DF2997).toString()).toBe('01:02:03;04');
  });

  it('pads single digits', () => {
    expect(Timecode.fromFrames(0, NDF30).toString()).toBe('00:00:00:00');
  });

  it('keeps three-digit hours', () => {
    expect(Timecode.parse('100:00:00:00', NDF30).toString()).toBe('100:00:00:00');
  });
});

describe('fromComponents', () => {
  it('validates fields', () => {
    const tc = Timecode.fromComponents({ hours: 0, minutes: 1, seconds: 0, frames: 2 }, DF2997);
    expect(tc.toString()).toBe('00:01:00;02');
  });

  it('rejects skipped drop-frame labels', () => {
    expect(
      errorCode(() => Timecode.fromComponents({ hours: 0, minutes: 1, seconds: 0, frames: 0 }, DF2997))
    ).toBe('INVALID_FRAMES');
  });

  it('rejects hours beyond 255', () => {
    expect(
      errorCode(() => Timecode.fromComponents({ hours: 256, minutes: 0, seconds: 0, frames: 0 }, NDF30))
    ).toBe('OVERFLOW');
  });
});

describe('addFrames', () => {
  it('carries non-drop frames', () => {
    expect(addOneFrame('00:01:02:00', NDF30)).toBe('00:01:02:01');
    expect(addOneFrame('00:01:02:29', NDF30)).toBe('00:01:03:00');
    expect(addOneFrame('00:01:59:29', NDF30)).toBe('00:02:00:00');
    expect(addOneFrame('00:59:59:29', NDF30)).toBe('01:00:00:00');
  });

  it('skips dropped labels at minute boundaries', () => {
    expect(addOneFrame('00:01:02;00', DF2997)).toBe('00:01:02;01');
    expect(addOneFrame('00:08:59;29', DF2997)).toBe('00:09:00;02');
  });

  it('does not skip at minutes divisible by 10', () => {
    expect(addOneFrame('00:09:59;29', DF2997)).toBe('00:10:00;00');
  });

  it('rejects negative and fractional counts', () => {
    const tc = Timecode.parse('00:00:01:00', NDF25);
    expect(errorCode(() => tc.addFrames(-1))).toBe('INVALID_FRAMES');
    expect(errorCode(() => tc.addFrames(1.5))).toBe('INVALID_FRAMES');
  });

  it('reports overflow past 32 bits', () => {
    const tc = Timecode.fromFrames(MAX_FRAME_COUNT, new NonDropFrame(20_000));
    expect(errorCode(() => tc.addFrames(1))).toBe('OVERFLOW');
  });
});

describe('add', () => {
  it('adds two timecodes', () => {
    const a = Timecode.parse('00:00:01:00', NDF25);
    const b = Timecode.parse('00:00:02:12', NDF25);
    expect(a.add(b).toString()).toBe('00:00:03:12');
  });

  it('handles carry correctly', () => {
    const a = Timecode.parse('00:59:59:24', NDF25);
    const b = Timecode.parse('00:00:00:01', NDF25);
    expect(a.add(b).toString()).toBe('01:00:00:00');
  });

  it('adds drop-frame timecodes by frame count', () => {
    const a = Timecode.parse('00:00:59;29', DF2997);
    const b = Timecode.parse('00:00:00;01', DF2997);
    expect(a.add(b).toString()).toBe('00:01:00;02');
  });

  it('rejects timecodes of different framerates', () => {
    const a = Timecode.parseComposite('00:00:01:00@30');
    const b = Timecode.parseComposite('00:00:01:00@25');
    expect(errorCode(() => a.add(b))).toBe('FRAMERATE_MISMATCH');
  });
});

describe('subtract', () => {
  it('subtracts two timecodes', () => {
    const a = Timecode.parse('00:00:05:00', NDF25);
    const b = Timecode.parse('00:00:02:00', NDF25);
    expect(a.subtract(b).toString()).toBe('00:00:03:00');
  });

  it('throws on negative result', () => {
    const a = Timecode.parse('00:00:01:00', NDF25);
    const b = Timecode.parse('00:00:02:00', NDF25);
    expect(errorCode(() => a.subtract(b))).toBe('UNDERFLOW');
  });

  it('subtracts frame counts', () => {
    const tc = Timecode.parse('00:09:00;02', DF2997);
    expect(tc.subtractFrames(1).toString()).toBe('00:08:59;29');
    expect(tc.subtractFrames(16184).toString()).toBe('00:00:00;00');
  });

  it('reports insufficient frames', () => {
    const tc = Timecode.parse('00:00:01:00', NDF25);
    expect(errorCode(() => tc.subtractFrames(26))).toBe('UNDERFLOW');
  });

  it('rejects timecodes of different framerates', () => {
    const a = Timecode.parseComposite('00:00:05;00@29.97');
    const b = Timecode.parseComposite('00:00:01:00@30');
    expect(errorCode(() => a.subtract(b))).toBe('FRAMERATE_MISMATCH');
  });
});

describe('equals and compare', () => {
  it('compares field by field', () => {
    const a = Timecode.parse('01:00:00;00', DF2997);
    expect(a.equals(Timecode.fromFrames(107892, DF2997))).toBe(true);
    expect(a.equals(Timecode.fromFrames(107893, DF2997))).toBe(false);
  });

  it('orders by frame count', () => {
    const a = Timecode.parse('00:00:01:00', NDF25);
    const b = Timecode.parse('00:00:02:00', NDF25);
    expect(a.compare(b)).toBe(-1);
    expect(b.compare(a)).toBe(1);
    expect(a.compare(a)).toBe(0);
  });

  it('rejects timecodes of different framerates', () => {
    const a = Timecode.parseComposite('00:00:01:00@30');
    const b = Timecode.parseComposite('00:00:01:00@25');
    expect(errorCode(() => a.equals(b))).toBe('FRAMERATE_MISMATCH');
    expect(errorCode(() => a.compare(b))).toBe('FRAMERATE_MISMATCH');
  });
});

describe('composite form', () => {
  it('parses <timecode>@<framerate>', () => {
    const tc = Timecode.parseComposite('01:02:15;23@29.97');
    expect(tc.toString()).toBe('01:02:15;23');
    expect(tc.framerate.equals(DF2997)).toBe(true);
    expect(tc.toCompositeString()).toBe('01:02:15;23@29.97');
  });

  it('requires a framerate', () => {
    expect(errorCode(() => Timecode.parseComposite('01:02:15;23'))).toBe('UNPARSED');
  });

  it('splits on the first @ only', () => {
    expect(errorCode(() => Timecode.parseComposite('01:02:15;23@29.97@x'))).toBe('INVALID_FRAMERATE');
  });

  it('rejects unknown framerates', () => {
    expect(errorCode(() => Timecode.parseComposite('01:02:15;23@abc'))).toBe('INVALID_FRAMERATE');
  });

  it('narrows to a fixed framerate', () => {
    const tc = Timecode.parseComposite('01:00:00;00@29.97').withFramerate(DF2997);
    expect(tc.framerate).toBe(DF2997);
    expect(tc.toFrameCount()).toBe(107892);
  });

  it('refuses to narrow to a different framerate', () => {
    const tc = Timecode.parseComposite('01:00:00;00@29.97');
    expect(errorCode(() => tc.withFramerate(NDF30))).toBe('FRAMERATE_MISMATCH');
  });
});

describe('JSON', () => {
  it('serializes as the canonical string', () => {
    const tc = Timecode.parse('01:10:00;12', DF2997);
    expect(JSON.stringify({ tc })).toBe('{"tc":"01:10:00;12"}');
    expect(JSON.stringify(Timecode.parse('01:10:00:12', NDF30))).toBe('"01:10:00:12"');
  });

  it('serializes with the framerate separator', () => {
    expect(JSON.stringify(Timecode.parse('01:10:00:12', DF2997))).toBe('"01:10:00;12"');
  });

  it('deserializes through validation', () => {
    const tc = Timecode.fromJSON('01:10:00;12', DF2997);
    expect(tc.toFrameCount()).toBe(125886);
    expect(errorCode(() => Timecode.fromJSON('00:01:00;00', DF2997))).toBe('INVALID_FRAMES');
    expect(errorCode(() => Timecode.fromJSON(42, NDF30))).toBe('UNPARSED');
  });
});
