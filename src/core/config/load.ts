/**
 * Configuration file loading.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parseConfig, type Config } from './schema.js';

export const DEFAULT_CONFIG_PATH = './smpte-frames.yaml';

/**
 * Load and validate a YAML configuration file.
 * A missing file yields the defaults; an empty file is treated the same.
 *
 * @throws ZodError if the file does not match the schema
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<Config> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    return parseConfig({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  const raw: unknown = parseYaml(content);

  return parseConfig(raw ?? {});
}
