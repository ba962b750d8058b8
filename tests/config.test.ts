/**
 * Configuration tests.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseConfig, safeParseConfig } from '../src/core/config/schema.js';
import { loadConfig } from '../src/core/config/load.js';

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({})).toEqual({
      framerate: '29.97',
      output: 'text',
      logging: { level: 'info', prettyPrint: true },
    });
  });

  it('accepts numeric framerates', () => {
    expect(parseConfig({ framerate: 25 }).framerate).toBe(25);
  });

  it('rejects unknown framerates', () => {
    const result = safeParseConfig({ framerate: 'fast' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['framerate']);
    }
  });

  it('rejects unknown output formats', () => {
    expect(safeParseConfig({ output: 'xml' }).success).toBe(false);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'smpte-frames-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', async () => {
    const config = await loadConfig(join(dir, 'missing.yaml'));
    expect(config).toEqual(parseConfig({}));
  });

  it('reads YAML', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'framerate: 25\noutput: json\nlogging:\n  level: warn\n');

    const config = await loadConfig(path);
    expect(config).toEqual({
      framerate: 25,
      output: 'json',
      logging: { level: 'warn', prettyPrint: true },
    });
  });

  it('treats an empty file as defaults', async () => {
    const path = join(dir, 'empty.yaml');
    await writeFile(path, '');
    expect(await loadConfig(path)).toEqual(parseConfig({}));
  });

  it('throws on invalid files', async () => {
    const path = join(dir, 'bad.yaml');
    await writeFile(path, 'output: xml\n');
    await expect(loadConfig(path)).rejects.toThrow();
  });
});
