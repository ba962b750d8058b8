#!/usr/bin/env node
/**
 * smpte-frames executable entry point.
 */

import { createProgram } from './cli.js';

await createProgram().parseAsync(process.argv);
