import { loadConfig } from './config';
import { flakeFmt } from './flake-fmt';
import { INixTool } from './nix';
import { SimpleError } from './util/flow';
import * as log from './util/log';

export interface CliOptions {
  readonly cwd: string;

  /**
   * @default - the nix command line tool, as configured
   */
  readonly nix?: INixTool;
}

/**
 * Everything the flake-fmt binary does, returning the process exit code
 *
 * SimpleErrors end the process with their own exit code, anything else with 1.
 */
export async function runCli(args: string[], options: CliOptions): Promise<number> {
  log.markStartTime();

  try {
    const config = loadConfig();
    log.setVerbose(config.verbose);
    log.debug('Debug logging enabled via FLAKE_FMT_DEBUG');

    return await flakeFmt({ cwd: options.cwd, args, config, nix: options.nix });
  } catch (e) {
    if (e instanceof SimpleError) {
      log.error(`Error: ${e.message}`);
      return e.exitCode;
    }
    // eslint-disable-next-line no-console
    console.error(e);
    return 1;
  }
}
