import { INixTool } from './nix';
import * as log from './util/log';
import { Timer } from './util/timer';

export interface BuildFormatterOptions {
  /**
   * Directory of the flake
   */
  readonly root: string;
  readonly system: string;
  readonly outLink: string;
}

export type BuildOutcome =
  | { readonly kind: 'built'; readonly outPath: string }
  | { readonly kind: 'unsupported'; readonly system: string };

/**
 * Build the flake's formatter for the given system, if it has one
 *
 * A flake that does not declare a formatter for this system is not an error.
 * The caller decides what to tell the user. A failing build throws.
 */
export async function buildFormatter(nix: INixTool, options: BuildFormatterOptions): Promise<BuildOutcome> {
  if (!await nix.hasFormatter(options.root, options.system)) {
    log.debug(`No formatter for ${options.system} in ${options.root}`);
    return { kind: 'unsupported', system: options.system };
  }

  log.debug(`Building formatter for ${options.system} into ${options.outLink}`);
  const timer = new Timer('build');
  const outPath = await nix.buildFormatter(options.root, options.system, options.outLink);
  timer.stop();
  log.debug(`Built ${outPath} in ${timer.humanTime()}`);

  return { kind: 'built', outPath };
}
