import * as path from 'path';
import { isExecutableFile, readdirIfExists } from './util/files';
import { SimpleError } from './util/flow';
import * as log from './util/log';

/**
 * treefmt packages ship more than one binary; this is the one to run
 */
export const PRIMARY_EXECUTABLE = 'treefmt';

export class NoFormatterFoundError extends SimpleError {
  constructor(public readonly artifactDir: string) {
    super(`No formatter found in ${path.join(artifactDir, 'bin')}`, 1);
    this.name = 'NoFormatterFoundError';
  }
}

/**
 * Pick the executable to run out of a built formatter
 *
 * In order: bin/treefmt, the first executable in bin/ by name, the artifact
 * itself if it is an executable file.
 */
export async function locateFormatter(artifactDir: string): Promise<string> {
  const binDir = path.join(artifactDir, 'bin');

  const primary = path.join(binDir, PRIMARY_EXECUTABLE);
  if (await isExecutableFile(primary)) {
    return primary;
  }

  const entries = await readdirIfExists(binDir);
  entries.sort();
  for (const entry of entries) {
    const candidate = path.join(binDir, entry);
    if (await isExecutableFile(candidate)) {
      if (entries.length > 1) {
        log.debug(`Choosing ${entry} out of ${entries.join(', ')}`);
      }
      return candidate;
    }
  }

  if (await isExecutableFile(artifactDir)) {
    return artifactDir;
  }

  throw new NoFormatterFoundError(artifactDir);
}
