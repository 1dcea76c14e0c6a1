import * as path from 'path';
import { parseArgs } from 'util';
import { CURATOR_VERSION, LOG_LEVELS, LogLevel, isLogLevel } from '../config/curator.config';
import { ValidationError, describeError } from '../utils/errors';

export interface CliOptions {
  inputPath: string;
  outputPath: string;
  urls: string[];
  threshold: number;
  interactiveReview: boolean;
  checkHomebrew: boolean;
  checkJapan: boolean;
  logLevel?: LogLevel;
  logFile?: string;
}

export type CliCommand =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'version' };

export interface CliDefaults {
  threshold: number;
}

export const USAGE = `Usage: dat-curator <input> [output] -u <url> [-u <url> ...] [options]

Keeps the catalog entries that best match the titles listed on one or more
reference wiki pages.

Arguments:
  input                      Catalog to curate (XML, root <datafile>)
  output                     Curated catalog (default: <input>_filtered.<ext> beside the input)

Options:
  -u, --url <url>            Reference page to scrape; repeatable, at least one
  -t, --threshold <0-100>    Minimum similarity for an automatic match
  -i, --interactive-review   Review unmatched titles against discarded entries
      --check-homebrew       Also fetch the '/Homebrew' page of every URL
      --check-japan          Also fetch the '/Japan' page of every URL
      --log-level <level>    Console log level (${LOG_LEVELS.join(', ')})
      --log-file <path>      Also write every log line (debug and up) to this file
  -v, --version              Print the version
  -h, --help                 Print this help`;

export function versionText(): string {
  return `dat-curator ${CURATOR_VERSION}`;
}

/** `<dir>/<base>_filtered<ext>`, with `.dat` when the input has no extension */
export function defaultOutputPath(inputPath: string): string {
  const ext = path.extname(inputPath);
  const base = path.basename(inputPath, ext);
  return path.join(path.dirname(path.resolve(inputPath)), `${base}_filtered${ext || '.dat'}`);
}

export function parseThreshold(raw: string): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value) || Number(value) > 100) {
    throw new ValidationError(`Threshold must be an integer between 0 and 100 (got '${raw}')`);
  }
  return Number(value);
}

function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value.trim());
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        url: { type: 'string', short: 'u', multiple: true },
        urls: { type: 'string', multiple: true },
        threshold: { type: 'string', short: 't' },
        'interactive-review': { type: 'boolean', short: 'i' },
        'check-homebrew': { type: 'boolean' },
        'check-japan': { type: 'boolean' },
        'log-level': { type: 'string' },
        'log-file': { type: 'string' },
        version: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new ValidationError(describeError(error));
  }
}

export function parseCli(argv: readonly string[], defaults: CliDefaults): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (positionals.length > 2) {
    throw new ValidationError(`Unexpected arguments: ${positionals.slice(2).join(' ')}`);
  }
  const [inputPath, outputArg] = positionals;
  if (inputPath === undefined) {
    throw new ValidationError('Missing input catalog path');
  }
  if (outputArg !== undefined && isHttpUrl(outputArg)) {
    throw new ValidationError(
      `Output path '${outputArg}' looks like a URL; repeat -u for each reference URL (-u URL1 -u URL2)`
    );
  }

  const urls = [...(values.url ?? []), ...(values.urls ?? [])].map((url) => url.trim()).filter(Boolean);
  if (urls.length === 0) {
    throw new ValidationError('At least one reference URL is required (-u <url>)');
  }

  const logLevelArg = values['log-level'];
  let logLevel: LogLevel | undefined;
  if (logLevelArg !== undefined) {
    const normalized = logLevelArg.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ValidationError(`Unknown log level '${logLevelArg}' (expected ${LOG_LEVELS.join(', ')})`);
    }
    logLevel = normalized;
  }

  return {
    kind: 'run',
    options: {
      inputPath,
      outputPath: outputArg ?? defaultOutputPath(inputPath),
      urls,
      threshold: values.threshold === undefined ? defaults.threshold : parseThreshold(values.threshold),
      interactiveReview: values['interactive-review'] === true,
      checkHomebrew: values['check-homebrew'] === true,
      checkJapan: values['check-japan'] === true,
      logLevel,
      logFile: values['log-file'],
    },
  };
}
