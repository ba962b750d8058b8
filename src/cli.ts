/**
 * smpte-frames CLI.
 *
 * Command-line access to timecode parsing, frame counts, arithmetic and
 * framerate conversion, plus configuration validation.
 *
 * @module smpte-frames/cli
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import type { Logger } from 'pino';
import { isTimecodeError, type TimecodeWarning } from './core/errors.js';
import type { DynFramerate } from './core/framerate/framerate.js';
import { parseFramerate } from './core/framerate/parse.js';
import { DEFAULT_CONFIG_PATH, loadConfig } from './core/config/load.js';
import {
  parseConfig,
  safeParseConfig,
  type Config,
  type LoggingConfig,
  type OutputFormat,
} from './core/config/schema.js';
import {
  addCommand,
  convertCommand,
  formatFramerateReport,
  formatTimecodeReport,
  fromFramesCommand,
  infoCommand,
  parseCommand,
  subtractCommand,
  type TimecodeReport,
} from './cli/commands.js';
import { createLogger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export interface CliContext {
  /** Receives command output, one block per call */
  write: (text: string) => void;
  createLogger: (config: LoggingConfig) => Logger;
  setExitCode: (code: number) => void;
}

interface GlobalOptions {
  config?: string;
  framerate?: string;
  json?: boolean;
}

interface CommandEnv {
  framerate: DynFramerate;
  format: OutputFormat;
}

interface CommandOutput {
  text: string;
  warnings?: TimecodeWarning[];
}

const defaultContext: CliContext = {
  write: (text) => console.log(text),
  createLogger,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

const WARNING_MESSAGES: Record<TimecodeWarning, string> = {
  MISMATCH_SEPARATOR: 'Timecode separator does not match the framerate',
};

// ============================================================================
// CLI Setup
// ============================================================================

export function createProgram(context: CliContext = defaultContext): Command {
  const program = new Command();

  program
    .name('smpte-frames')
    .description('SMPTE timecode parsing, frame counts and framerate conversion')
    .version('0.1.0')
    .option('-c, --config <path>', `Path to configuration file (default: ${DEFAULT_CONFIG_PATH})`)
    .option('-r, --framerate <rate>', 'Framerate, e.g. 25, 29.97, 23.98, 59.94')
    .option('--json', 'Print JSON output');

  const run = (task: (env: CommandEnv) => CommandOutput) =>
    runCommand(program.opts<GlobalOptions>(), context, task);

  // --------------------------------------------------------------------------
  // Timecode Commands
  // --------------------------------------------------------------------------

  program
    .command('parse')
    .description('Validate a timecode and print its frame count')
    .argument('<timecode>', 'HH:MM:SS:FF, HH:MM:SS;FF or <timecode>@<framerate>')
    .action((input: string) =>
      run(({ framerate, format }) => timecodeOutput(parseCommand(input, framerate), format))
    );

  program
    .command('from-frames')
    .description('Print the timecode at an absolute frame count')
    .argument('<count>', 'Frame count since 00:00:00:00')
    .action((count: string) =>
      run(({ framerate, format }) => timecodeOutput(fromFramesCommand(count, framerate), format))
    );

  program
    .command('add')
    .description('Add a timecode or a frame count to a timecode')
    .argument('<timecode>', 'Base timecode')
    .argument('<operand>', 'Timecode or frame count to add')
    .action((input: string, operand: string) =>
      run(({ framerate, format }) => timecodeOutput(addCommand(input, operand, framerate), format))
    );

  program
    .command('subtract')
    .description('Subtract a timecode or a frame count from a timecode')
    .argument('<timecode>', 'Base timecode')
    .argument('<operand>', 'Timecode or frame count to subtract')
    .action((input: string, operand: string) =>
      run(({ framerate, format }) => timecodeOutput(subtractCommand(input, operand, framerate), format))
    );

  program
    .command('convert')
    .description('Convert a timecode to another framerate')
    .argument('<timecode>', 'Timecode to convert')
    .requiredOption('-t, --to <rate>', 'Target framerate')
    .option('-s, --start <timecode>', 'Start timecode shared by source and target')
    .action((input: string, options: { to: string; start?: string }) =>
      run(({ framerate, format }) => timecodeOutput(convertCommand(input, options, framerate), format))
    );

  program
    .command('info')
    .description('Describe a framerate')
    .argument('<framerate>', 'Framerate, e.g. 29.97')
    .action((input: string) =>
      run(({ format }) => ({ text: formatFramerateReport(infoCommand(input), format) }))
    );

  // --------------------------------------------------------------------------
  // Validate Config Command
  // --------------------------------------------------------------------------

  program
    .command('validate-config')
    .description('Validate configuration file')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const logger = context.createLogger(parseConfig({}).logging);

      try {
        const configPath = resolve(resolveConfigPath(options));

        if (!existsSync(configPath)) {
          logger.error({ path: configPath }, 'Configuration file not found');
          context.setExitCode(1);
          return;
        }

        logger.info({ path: configPath }, 'Validating configuration');

        const content = await readFile(configPath, 'utf-8');
        const raw: unknown = parseYaml(content);
        const result = safeParseConfig(raw ?? {});

        if (!result.success) {
          logger.error('Configuration validation failed:');
          for (const issue of result.error.issues) {
            logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
          }
          context.setExitCode(1);
          return;
        }

        logger.info('Configuration valid');
        context.write(JSON.stringify(result.data, null, 2));
      } catch (error) {
        logger.fatal({ error }, 'Failed to validate configuration');
        context.setExitCode(1);
      }
    });

  return program;
}

// ============================================================================
// Command Runner
// ============================================================================

async function runCommand(
  options: GlobalOptions,
  context: CliContext,
  task: (env: CommandEnv) => CommandOutput
): Promise<void> {
  let config: Config;
  try {
    config = await loadConfig(resolveConfigPath(options));
  } catch (error) {
    const logger = context.createLogger(parseConfig({}).logging);
    if (error instanceof ZodError) {
      for (const issue of error.issues) {
        logger.error({ path: issue.path.join('.') }, issue.message);
      }
    } else {
      logger.fatal({ error }, 'Failed to load configuration');
    }
    context.setExitCode(1);
    return;
  }

  const logger = context.createLogger(config.logging);
  const format: OutputFormat = options.json ? 'json' : config.output;

  try {
    const framerate = parseFramerate(options.framerate ?? config.framerate);
    const output = task({ framerate, format });

    for (const warning of output.warnings ?? []) {
      logger.warn({ warning }, WARNING_MESSAGES[warning]);
    }
    context.write(output.text);
  } catch (error) {
    if (isTimecodeError(error)) {
      logger.error({ code: error.code, value: error.value }, error.message);
    } else {
      logger.fatal({ error }, 'Command failed');
    }
    context.setExitCode(1);
  }
}

function timecodeOutput(report: TimecodeReport, format: OutputFormat): CommandOutput {
  return { text: formatTimecodeReport(report, format), warnings: report.warnings };
}

function resolveConfigPath(options: GlobalOptions): string {
  return options.config ?? process.env['TIMECODE_CONFIG'] ?? DEFAULT_CONFIG_PATH;
}
