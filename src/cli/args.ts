/**
 * Command line parsing
 */

import { DEFAULT_PUZZLE } from '../domain/constants.js';

export interface CLIOptions {
  command: 'solve' | 'analyze' | 'list' | 'help';
  puzzle: string;
  date?: string;
  all: boolean;
  limit?: number;
  sorted: boolean;
  partition: boolean;
  outputFormat: 'text' | 'json';
  ppmFile?: string;
  bruteForce: boolean;
  check: boolean;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new Error(`${flag} needs a value`);
  }
  return value;
}

function parseLimit(value: string): number {
  const limit = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!(limit >= 1)) {
    throw new Error('--limit must be a positive integer');
  }
  return limit;
}

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    puzzle: DEFAULT_PUZZLE,
    all: false,
    sorted: false,
    partition: false,
    outputFormat: 'text',
    bruteForce: false,
    check: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case 'solve':
      case 'analyze':
      case 'list':
        options.command = arg;
        break;

      case '-p':
      case '--puzzle':
        options.puzzle = requireValue(arg, args[++i]);
        break;

      case '-d':
      case '--date':
        options.date = requireValue(arg, args[++i]);
        break;

      case '-a':
      case '--all':
        options.all = true;
        break;

      case '--limit':
        options.limit = parseLimit(requireValue(arg, args[++i]));
        break;

      case '--sorted':
        options.sorted = true;
        break;

      case '--partition':
        options.partition = true;
        break;

      case '-f':
      case '--format': {
        const format = requireValue(arg, args[++i]);
        if (format !== 'text' && format !== 'json') {
          throw new Error(`Unknown format "${format}" (expected text or json)`);
        }
        options.outputFormat = format;
        break;
      }

      case '--ppm':
        options.ppmFile = requireValue(arg, args[++i]);
        break;

      case '--brute-force':
        options.bruteForce = true;
        break;

      case '--check':
        options.check = true;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      default:
        throw new Error(`Unknown argument "${arg}"`);
    }
  }

  return options;
}
