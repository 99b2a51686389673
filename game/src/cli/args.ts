import { parseArgs } from 'node:util';
import { AppError, ERR, describeError } from '@life/shared';
import { DEFAULT_INTERVAL_MS, USAGE_STATUS, type LifeConfig } from './config';

export type CliCommand = { kind: 'help' } | { kind: 'run'; config: LifeConfig };

function usageError(message: string): AppError {
  return new AppError(ERR.INVALID_PARAM, message, USAGE_STATUS);
}

function parseInterval(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_INTERVAL_MS;
  const ms = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(ms) || ms <= 0) {
    throw usageError(`update rate must be a positive integer, got "${raw}"`);
  }
  return ms;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'update-rate-ms': { type: 'string', short: 't' },
        center: { type: 'boolean', short: 'c' },
        help: { type: 'boolean', short: 'h' }
      }
    });
  } catch (err) {
    throw usageError(describeError(err));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };

  if (positionals.length === 0) throw usageError('missing initial state configuration file');
  if (positionals.length > 1) throw usageError(`unexpected argument "${positionals[1]}"`);

  return {
    kind: 'run',
    config: {
      seedFile: positionals[0],
      intervalMs: parseInterval(values['update-rate-ms']),
      center: values.center ?? false
    }
  };
}
