/**
 * Command-line front end.
 *
 *   crc32-engine selftest [--trials N] [--seed S] [--preset ethernet|forward] [--gaps] [--quiet]
 *
 * @module cli/run
 */

import { PRESETS } from '../crc/config';
import { SIM_DEFAULT_SEED, SIM_DEFAULT_TRIALS } from '../crc/constants';
import { run_simulation } from '../harness/simulation';

const USAGE = [
  'usage:',
  '  crc32-engine selftest [--trials N] [--seed S] [--preset ethernet|forward] [--gaps] [--quiet]'
].join('\n');

/** Parsed command line. */
export interface CliArgs {
  command: string | null;
  flags: Record<string, string>;
}

/**
 * Split argv into a command and `--flag value` pairs. A flag without a
 * value is recorded as "true".
 */
export function parse_args(argv: readonly string[]): CliArgs {
  const flags: Record<string, string> = {};
  let command: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      if (command === null) {
        command = arg;
      }
      continue;
    }
    const key = arg.slice(2);
    const value = argv[i + 1];
    if (value !== undefined && !value.startsWith('--')) {
      flags[key] = value;
      i++;
    } else {
      flags[key] = 'true';
    }
  }

  return { command, flags };
}

/** Parse a decimal or 0x-prefixed integer flag. */
function int_flag(flags: Record<string, string>, name: string, fallback: number): number {
  const raw = flags[name];
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} expects a non-negative integer, got "${raw}"`);
  }
  return value;
}

/** Run the randomized self-check. Returns the process exit code. */
export function run_selftest(flags: Record<string, string>): number {
  const preset_name = flags.preset ?? 'ethernet';
  if (preset_name !== 'ethernet' && preset_name !== 'forward') {
    throw new Error(`--preset expects ethernet or forward, got "${preset_name}"`);
  }

  const report = run_simulation({
    config: PRESETS[preset_name],
    trials: int_flag(flags, 'trials', SIM_DEFAULT_TRIALS),
    seed: int_flag(flags, 'seed', SIM_DEFAULT_SEED),
    idle_gaps: flags.gaps === 'true',
    log: flags.quiet !== 'true'
  });

  return report.passed ? 0 : 1;
}

/**
 * Dispatch a command line. Resolves to the process exit code.
 */
export async function run_cli(argv: readonly string[]): Promise<number> {
  const { command, flags } = parse_args(argv);

  try {
    switch (command) {
      case 'selftest':
        return run_selftest(flags);
      default:
        console.error(USAGE);
        return 2;
    }
  } catch (err) {
    console.error(`[CLI] ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }
}
