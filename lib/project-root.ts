import * as path from 'path';
import { findFileUp, isFile } from './util/files';
import * as log from './util/log';

export const FLAKE_FILE = 'flake.nix';

/**
 * Find the directory of the closest flake.nix at or above `startDir`
 *
 * Falls back to `startDir` itself if there is none; whatever comes next
 * will complain about the missing flake.
 */
export async function findProjectRoot(startDir: string): Promise<string> {
  const flakeFile = await findFileUp(FLAKE_FILE, startDir, isFile);
  if (flakeFile === undefined) {
    log.debug(`No ${FLAKE_FILE} found upwards from ${startDir}`);
    return path.resolve(startDir);
  }
  return path.dirname(flakeFile);
}
