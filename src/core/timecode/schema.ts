/**
 * zod schemas for timecodes and framerates in structured data.
 *
 * A timecode serializes as its canonical string ("01:10:00;12") and is read
 * back through the full parse and validate pipeline.
 */

import { z } from 'zod';
import { isTimecodeError } from '../errors.js';
import type { DynFramerate, Framerate } from '../framerate/framerate.js';
import { parseFramerate } from '../framerate/parse.js';
import { Timecode } from './timecode.js';
import { safeParseTimecode } from './validate.js';

/**
 * "29.97", "25", 23.976, ... → `DynFramerate`
 */
export const framerateSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx): DynFramerate => {
    try {
      return parseFramerate(value);
    } catch (error) {
      if (!isTimecodeError(error)) {
        throw error;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error.message,
        params: { code: error.code },
      });
      return z.NEVER;
    }
  });

/**
 * Canonical timecode string at a known framerate.
 *
 * @example
 * timecodeSchema(DF2997).parse('01:10:00;12').toFrameCount(); // 125886
 */
export function timecodeSchema<FR extends Framerate>(framerate: FR) {
  return z.string().transform((value, ctx): Timecode<FR> => {
    const result = safeParseTimecode(value, framerate);
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error.message,
        params: { code: result.error.code },
      });
      return z.NEVER;
    }
    return result.timecode;
  });
}

/**
 * Composite "<timecode>@<framerate>" string, for timecodes whose framerate is
 * only known at runtime.
 */
export const compositeTimecodeSchema = z
  .string()
  .transform((value, ctx): Timecode<DynFramerate> => {
    try {
      return Timecode.parseComposite(value);
    } catch (error) {
      if (!isTimecodeError(error)) {
        throw error;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error.message,
        params: { code: error.code },
      });
      return z.NEVER;
    }
  });
