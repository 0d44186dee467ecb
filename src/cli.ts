/**
 * Command line flags
 */

import { parseSourceList } from './config/sources.js';
import { parseCalendarDate } from './utils/calendar.js';
import { ConfigError } from './utils/errors.js';
import type { PipelineOptions } from './pipeline.js';

export interface CliOptions {
  runOnce: boolean;
  pipeline: PipelineOptions;
}

const KNOWN_FLAGS = new Set(['--run', '--service', '--skip-enrich', '--skip-crawl']);

/**
 * `--run`, `--service`, `--until=YYYY-MM-DD`, `--from=YYYY-MM-DD`,
 * `--skip-enrich`, `--skip-crawl`, `--sources=name:id,...`,
 * `--enrich-from=YYYY-MM-DD`, `--enrich-to=YYYY-MM-DD`
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const pipeline: PipelineOptions = {};

  for (const arg of args) {
    const [flag, value] = splitFlag(arg);

    switch (flag) {
      case '--until':
        pipeline.floorDate = parseCalendarDate(requireValue(flag, value));
        pipeline.mode = 'gap-fill';
        break;
      case '--from':
        pipeline.startDate = parseCalendarDate(requireValue(flag, value));
        break;
      case '--sources':
        pipeline.sources = parseSourceList(requireValue(flag, value));
        break;
      case '--enrich-from':
        pipeline.enrichRange = { ...pipeline.enrichRange, from: parseCalendarDate(requireValue(flag, value)) };
        break;
      case '--enrich-to':
        pipeline.enrichRange = { ...pipeline.enrichRange, to: parseCalendarDate(requireValue(flag, value)) };
        break;
      case '--skip-enrich':
        pipeline.skipEnrich = true;
        break;
      case '--skip-crawl':
        pipeline.skipCrawl = true;
        break;
      default:
        if (!KNOWN_FLAGS.has(flag)) {
          throw new ConfigError(`Unknown argument: ${arg}`);
        }
    }
  }

  if (pipeline.startDate && pipeline.floorDate && pipeline.startDate < pipeline.floorDate) {
    throw new ConfigError('--from must not be earlier than --until');
  }

  const range = pipeline.enrichRange;
  if (range?.from && range.to && range.to < range.from) {
    throw new ConfigError('--enrich-to must not be earlier than --enrich-from');
  }

  const runOnce = args.includes('--run');
  return { runOnce: runOnce && !args.includes('--service'), pipeline };
}

function splitFlag(arg: string): [string, string | undefined] {
  const index = arg.indexOf('=');
  return index === -1 ? [arg, undefined] : [arg.slice(0, index), arg.slice(index + 1)];
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}
