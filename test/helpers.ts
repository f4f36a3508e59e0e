import * as os from 'os';
import * as path from 'path';
import { promises as fs } from 'fs';
import { INixTool, NixCommandError } from '../lib/nix';

export async function makeTempDir(prefix = 'flake-fmt-test-'): Promise<string> {
  // realpath, because the project root we compute is resolved too
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function writeFile(fileName: string, content: string = '') {
  await fs.mkdir(path.dirname(fileName), { recursive: true });
  await fs.writeFile(fileName, content, { encoding: 'utf-8' });
}

export async function writeExecutable(fileName: string, content: string) {
  await writeFile(fileName, content);
  await fs.chmod(fileName, 0o755);
}

/**
 * A formatter that writes its arguments one per line to `outFile`
 */
export function recordingFormatter(outFile: string, exitCode: number = 0) {
  return `#!/bin/sh\nprintf '%s\\n' "$@" > '${outFile}'\nexit ${exitCode}\n`;
}

export function secondsAgo(n: number) {
  return new Date(Date.now() - n * 1000);
}

export async function setMtime(fileName: string, time: Date) {
  await fs.utimes(fileName, time, time);
}

export async function setLinkMtime(fileName: string, time: Date) {
  await fs.lutimes(fileName, time, time);
}

export interface FakeNixOptions {
  readonly system?: string;
  readonly hasFormatter?: boolean;

  /**
   * Files to put in the formatter's bin/ directory, name to script
   */
  readonly binaries?: Record<string, string>;

  /**
   * Make nix build fail with this exit code
   */
  readonly buildExitCode?: number;

  /**
   * Leave an existing out link alone, like nix does when the store path is unchanged
   */
  readonly keepExistingLink?: boolean;
}

/**
 * Builds formatters by writing scripts into a directory posing as the Nix store
 */
export class FakeNix implements INixTool {
  public builds = 0;
  public readonly buildRequests = new Array<{ flakeDir: string; system: string; outLink: string }>();
  public readonly system: string;

  constructor(private readonly storeDir: string, private readonly options: FakeNixOptions = {}) {
    this.system = options.system ?? 'x86_64-linux';
  }

  public async currentSystem() {
    return this.system;
  }

  public async hasFormatter(_flakeDir: string, system: string) {
    return (this.options.hasFormatter ?? true) && system === this.system;
  }

  public async buildFormatter(flakeDir: string, system: string, outLink: string) {
    this.buildRequests.push({ flakeDir, system, outLink });
    if (this.options.buildExitCode !== undefined) {
      throw new NixCommandError(['nix', 'build', `.#formatter.${system}`], this.options.buildExitCode, 'error: builder failed');
    }

    this.builds += 1;
    const outPath = path.join(this.storeDir, `${this.builds}-formatter`);
    for (const [name, script] of Object.entries(this.options.binaries ?? {})) {
      await writeExecutable(path.join(outPath, 'bin', name), script);
    }
    await fs.mkdir(outPath, { recursive: true });

    const linkExists = await fs.lstat(outLink).then(() => true, () => false);
    if (!(this.options.keepExistingLink && linkExists)) {
      await fs.rm(outLink, { force: true });
      await fs.symlink(outPath, outLink);
    }
    return outPath;
  }
}
