import { FlakeFmtConfig } from './config';
import { dispatch } from './dispatch';
import { buildFormatter } from './formatter-build';
import { FormatterCache } from './formatter-cache';
import { locateFormatter } from './locate-formatter';
import { INixTool, NixCli } from './nix';
import { findProjectRoot } from './project-root';
import * as log from './util/log';

export interface FlakeFmtOptions {
  /**
   * Directory to start looking for flake.nix from
   */
  readonly cwd: string;

  /**
   * Arguments for the formatter, passed on unchanged
   */
  readonly args: string[];

  readonly config: FlakeFmtConfig;

  /**
   * @default - the nix command line tool, as configured
   */
  readonly nix?: INixTool;
}

/**
 * Run the project's formatter, building it first if the cached one is out of date
 *
 * Returns the exit code to end the process with. Failures along the way are
 * thrown as SimpleErrors that carry their own exit code.
 */
export async function flakeFmt(options: FlakeFmtOptions): Promise<number> {
  const { config } = options;
  const nix = options.nix ?? new NixCli({ nixBinary: config.nixBinary, extraArgs: config.nixArgs });

  const root = await findProjectRoot(options.cwd);
  log.debug(`Flake root: ${root}`);

  const cache = FormatterCache.forRoot(root, config.cacheBase);
  log.debug(`Formatter cache entry: ${cache.entryPath}`);

  const status = await cache.check({ forceRebuild: config.forceRebuild });
  if (status.needsRebuild) {
    log.debug(`Rebuilding formatter (${status.reason === 'stale' ? `${status.changedFile} changed` : status.reason})`);

    const system = await nix.currentSystem();
    log.debug(`Current system: ${system}`);

    const outcome = await buildFormatter(nix, { root, system, outLink: cache.entryPath });
    if (outcome.kind === 'unsupported') {
      log.warning(`Warning: No formatter defined for system ${outcome.system} in flake.nix`);
      return 0;
    }
    await cache.markBuilt();
  } else {
    log.debug('Using cached formatter');
  }

  const target = await locateFormatter(cache.entryPath);
  return dispatch(target, options.args);
}
