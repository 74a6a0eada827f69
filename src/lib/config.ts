import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { ConfigError, describeCause } from './errors';

export interface StampConfig {
  input: string;
  stamp: string;
  /** Stamp pixels per inch; 0 reads it from the image */
  stampDpi: number;
  /** 1-based; negative counts from the end */
  page: number;
  /** Stamp left edge from the page's left edge, mm */
  x: number;
  /** Stamp top edge from the page's top edge, mm */
  y: number;
  scale: number;
  output?: string;
  overwrite: boolean;
}

export const DEFAULT_CONFIG: Omit<StampConfig, 'input' | 'stamp'> = {
  stampDpi: 0,
  page: 1,
  x: 0,
  y: 0,
  scale: 1,
  overwrite: false,
};

export type CliLogLevel = 'info' | 'debug' | 'error';

export interface CliOptions {
  config: StampConfig;
  print: boolean;
  help: boolean;
  logLevel: CliLogLevel;
}

export const USAGE = `Usage: pdf-stamp --input <file.pdf> --stamp <image> [options]

Options:
  --input <file>       PDF input file (required)
  --stamp <file>       PNG or JPEG stamp image (required)
  --stamp-dpi <n>      stamp density in pixels per inch, 0 reads it from the image (default: 0.0)
  --page <n>           page to stamp, negative counts from the end; use --page=-2 (default: 1)
  --x <mm>             stamp X position, left to right, in mm (default: 0.0)
  --y <mm>             stamp Y position, top to bottom, in mm (default: 0.0)
  --scale <n>          scale factor for the stamp (default: 1.0)
  --output <file>      output PDF (default: <input>_sig.pdf next to the input)
  --overwrite          replace an existing default output file
  --print              print the equivalent command line
  --verbose            debug logging
  --quiet              errors only
  --help               show this help`;

/**
 * Reject configurations that can never produce a correct stamp. Runs before any file is
 * read, so nothing is written for an invalid run.
 */
export function validateConfig(config: StampConfig): StampConfig {
  if (!config.input) throw new ConfigError('Missing --input');
  if (!config.stamp) throw new ConfigError('Missing --stamp');
  if (!Number.isFinite(config.stampDpi) || config.stampDpi < 0) {
    throw new ConfigError(`--stamp-dpi must be zero or positive, got ${config.stampDpi}`);
  }
  if (!Number.isInteger(config.page) || config.page === 0) {
    throw new ConfigError(`--page must be a non-zero integer, got ${config.page}`);
  }
  if (!Number.isFinite(config.x) || !Number.isFinite(config.y)) {
    throw new ConfigError(`Position must be finite, got (${config.x}, ${config.y})`);
  }
  if (!Number.isFinite(config.scale) || config.scale <= 0) {
    throw new ConfigError(`--scale must be greater than zero, got ${config.scale}`);
  }
  return config;
}

function parseNumber(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigError(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        input: { type: 'string' },
        stamp: { type: 'string' },
        'stamp-dpi': { type: 'string' },
        page: { type: 'string' },
        x: { type: 'string' },
        y: { type: 'string' },
        scale: { type: 'string' },
        output: { type: 'string' },
        overwrite: { type: 'boolean' },
        print: { type: 'boolean' },
        verbose: { type: 'boolean' },
        quiet: { type: 'boolean' },
        help: { type: 'boolean' },
      },
    }).values;
  } catch (error) {
    // node:util reports unknown flags and missing values as TypeErrors
    throw new ConfigError(describeCause(error), { cause: error });
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);
  const logLevel: CliLogLevel = values.verbose ? 'debug' : values.quiet ? 'error' : 'info';
  const print = values.print ?? false;

  const config: StampConfig = {
    input: values.input ?? '',
    stamp: values.stamp ?? '',
    stampDpi: parseNumber('--stamp-dpi', values['stamp-dpi'], DEFAULT_CONFIG.stampDpi),
    page: parseNumber('--page', values.page, DEFAULT_CONFIG.page),
    x: parseNumber('--x', values.x, DEFAULT_CONFIG.x),
    y: parseNumber('--y', values.y, DEFAULT_CONFIG.y),
    scale: parseNumber('--scale', values.scale, DEFAULT_CONFIG.scale),
    output: values.output,
    overwrite: values.overwrite ?? false,
  };

  if (values.help) {
    return { config, print, help: true, logLevel };
  }
  return { config: validateConfig(config), print, help: false, logLevel };
}

/** `<dir>/<name>_sig.pdf` beside the input. */
export function autoOutputPath(input: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, `${parsed.name}_sig.pdf`);
}
