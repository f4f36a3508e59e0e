import yargs from 'yargs';

export const ENV_PREFIX = 'FLAKE_FMT';

export interface FlakeFmtConfig {
  /**
   * Print debug logging (FLAKE_FMT_DEBUG)
   */
  readonly verbose: boolean;

  /**
   * Ignore a valid cache entry and build anyway (FLAKE_FMT_REBUILD, or NO_CACHE set to anything)
   */
  readonly forceRebuild: boolean;

  /**
   * The nix binary to run (FLAKE_FMT_NIX)
   */
  readonly nixBinary: string;

  /**
   * Extra arguments for nix eval and nix build (FLAKE_FMT_NIX_ARGS, whitespace-separated)
   */
  readonly nixArgs: string[];

  /**
   * Where the flake-fmt cache directory goes (FLAKE_FMT_CACHE_DIR)
   *
   * Defaults to `.cache` in the project root.
   */
  readonly cacheBase?: string;
}

const TRUTHY = ['1', 'true', 'yes', 'on'];

/**
 * Read configuration from FLAKE_FMT_* environment variables
 *
 * Command line arguments are never looked at: they all belong to the formatter.
 */
export function loadConfig(): FlakeFmtConfig {
  const argv = yargs([])
    .env(ENV_PREFIX)
    .option('debug', { type: 'string', default: '' })
    .option('rebuild', { type: 'string', default: '' })
    .option('nix', { type: 'string', default: 'nix' })
    .option('nix-args', { type: 'string', default: '' })
    .option('cache-dir', { type: 'string' })
    .help(false)
    .version(false)
    .parseSync();

  return {
    verbose: isTruthy(argv.debug),
    forceRebuild: isTruthy(argv.rebuild) || (process.env.NO_CACHE ?? '') !== '',
    nixBinary: argv.nix || 'nix',
    nixArgs: argv.nixArgs.split(/\s+/).filter(a => a !== ''),
    cacheBase: argv.cacheDir || undefined,
  };
}

export function isTruthy(value: string) {
  return TRUTHY.includes(value.trim().toLowerCase());
}
