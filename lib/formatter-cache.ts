import * as crypto from 'crypto';
import * as path from 'path';
import { promises as fs } from 'fs';
import { ignoreEnoent, isDirectory, lstatIfExists, statIfExists } from './util/files';
import * as log from './util/log';

export const TOOL_NAME = 'flake-fmt';

/**
 * Files in the project root that invalidate the cached formatter when they change
 */
export const WATCHED_INPUTS = ['flake.nix', 'flake.lock'];

export type CacheStatus =
  | { readonly needsRebuild: true; readonly reason: 'missing' | 'forced' }
  | { readonly needsRebuild: true; readonly reason: 'stale'; readonly changedFile: string }
  | { readonly needsRebuild: false; readonly reason: 'fresh' };

export interface CheckOptions {
  /**
   * Rebuild even if the cache entry looks valid
   *
   * @default false
   */
  readonly forceRebuild?: boolean;
}

/**
 * Identifier for a project root that is safe to use as a file name
 */
export function cacheKeyFor(root: string): string {
  return crypto.createHash('sha256').update(root, 'utf-8').digest('hex');
}

/**
 * The cached formatter build of one project
 *
 * The entry is the `--out-link` that nix build leaves behind, so the link
 * itself keeps the formatter alive and its own mtime records when it was built.
 * Validity is decided purely on modification times: an edit that leaves a
 * watched file's mtime at or below the entry's (clock skew, coarse timestamps,
 * a restored old copy) goes unnoticed.
 */
export class FormatterCache {
  /**
   * A relative `cacheBase` is taken relative to the project root, which is
   * also where nix build runs.
   */
  public static forRoot(root: string, cacheBase?: string) {
    const cacheDir = path.join(path.resolve(root, cacheBase ?? '.cache'), TOOL_NAME);
    return new FormatterCache(root, cacheDir, path.join(cacheDir, cacheKeyFor(root)));
  }

  constructor(
    public readonly root: string,
    public readonly cacheDir: string,
    public readonly entryPath: string) {
  }

  public async check(options: CheckOptions = {}): Promise<CacheStatus> {
    // A link whose target was garbage collected is just a miss
    if (!await isDirectory(this.entryPath)) {
      log.debug(`No cached formatter at ${this.entryPath}`);
      await fs.mkdir(this.cacheDir, { recursive: true });
      return { needsRebuild: true, reason: 'missing' };
    }

    if (options.forceRebuild) {
      log.debug('Rebuild forced by configuration');
      return { needsRebuild: true, reason: 'forced' };
    }

    // The link's own time, not the store path's (those are all at the epoch)
    const entryStat = await lstatIfExists(this.entryPath);
    if (entryStat === undefined) {
      return { needsRebuild: true, reason: 'missing' };
    }
    const referenceTime = entryStat.mtimeMs;

    for (const file of WATCHED_INPUTS) {
      const st = await statIfExists(path.join(this.root, file));
      if (st === undefined) { continue; }

      if (st.mtimeMs > referenceTime) {
        log.debug(`${file} is newer than the cached formatter (${st.mtime.toISOString()} > ${entryStat.mtime.toISOString()})`);
        return { needsRebuild: true, reason: 'stale', changedFile: file };
      }
    }

    return { needsRebuild: false, reason: 'fresh' };
  }

  /**
   * Stamp the entry as built just now
   *
   * nix build leaves an existing link alone if the store path did not change,
   * which would otherwise make every following run see a stale entry.
   */
  public async markBuilt(now: Date = new Date()) {
    await ignoreEnoent(() => fs.lutimes(this.entryPath, now, now));
  }
}
