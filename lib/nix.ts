import * as log from './util/log';
import { CommandResult, runCommand, RunCommandOptions } from './util/exec';
import { errorCode, SimpleError } from './util/flow';

const EXPERIMENTAL_FEATURES = ['--extra-experimental-features', 'nix-command flakes'];

/**
 * The part of Nix we depend on
 */
export interface INixTool {
  /**
   * The system identifier of this machine, e.g. 'x86_64-linux'
   */
  currentSystem(): Promise<string>;

  /**
   * Whether the flake in the given directory has a formatter for the given system
   */
  hasFormatter(flakeDir: string, system: string): Promise<boolean>;

  /**
   * Build the formatter, leaving a link to it at `outLink`
   *
   * Returns the store path that was built.
   */
  buildFormatter(flakeDir: string, system: string, outLink: string): Promise<string>;
}

export class NixCommandError extends SimpleError {
  constructor(public readonly command: string[], exitCode: number, public readonly stderr: string) {
    super(`Nix command failed with exit code ${exitCode}: ${command.join(' ')}${stderr ? `\nstderr: ${stderr.trim()}` : ''}`, exitCode);
    this.name = 'NixCommandError';
  }
}

export interface NixCliOptions {
  /**
   * The nix binary to run
   *
   * @default 'nix'
   */
  readonly nixBinary?: string;

  /**
   * Additional arguments for evaluating and building the formatter
   *
   * @default []
   */
  readonly extraArgs?: string[];
}

/**
 * Talks to Nix by running the `nix` command line tool
 */
export class NixCli implements INixTool {
  private readonly nixBinary: string;
  private readonly extraArgs: string[];

  constructor(options: NixCliOptions = {}) {
    this.nixBinary = options.nixBinary ?? 'nix';
    this.extraArgs = options.extraArgs ?? [];
  }

  public async currentSystem(): Promise<string> {
    return (await this.nix(['eval', '--raw', '--impure', '--expr', 'builtins.currentSystem'])).trim();
  }

  public async hasFormatter(flakeDir: string, system: string): Promise<boolean> {
    try {
      const result = await this.nix(['eval', '.#formatter', '--apply', `(val: val ? ${system})`, ...this.extraArgs], { cwd: flakeDir });
      return result.trim() === 'true';
    } catch (e) {
      // A flake without any formatter output at all
      if (e instanceof NixCommandError && e.stderr.includes('does not provide attribute')) {
        log.debug(`Flake has no formatter attribute: ${e.stderr.trim()}`);
        return false;
      }
      throw e;
    }
  }

  public async buildFormatter(flakeDir: string, system: string, outLink: string): Promise<string> {
    const stdout = await this.nix([
      'build',
      '--print-out-paths',
      '--out-link', outLink,
      '--builders', '',
      '--keep-failed',
      ...this.extraArgs,
      `.#formatter.${system}`,
    ], { cwd: flakeDir, inheritStderr: true });

    const paths = stdout.split('\n').map(l => l.trim()).filter(l => l !== '');
    const outPath = paths[paths.length - 1];
    if (outPath === undefined) {
      throw new SimpleError(`nix build did not report an output path for .#formatter.${system}`);
    }
    return outPath;
  }

  private async nix(args: string[], options: RunCommandOptions = {}): Promise<string> {
    const command = [this.nixBinary, ...EXPERIMENTAL_FEATURES, ...args];
    log.debug(`Running: ${command.map(quoteForDisplay).join(' ')}`);

    let result: CommandResult;
    try {
      result = await runCommand(this.nixBinary, command.slice(1), options);
    } catch (e) {
      if (errorCode(e) === 'ENOENT') {
        throw new SimpleError(`Could not find '${this.nixBinary}'. Is Nix installed and on the PATH?`);
      }
      throw e;
    }

    if (result.exitCode !== 0) {
      throw new NixCommandError(command, result.exitCode, result.stderr);
    }
    return result.stdout;
  }
}

function quoteForDisplay(x: string) {
  return x === '' || /[\s'"]/.test(x) ? `'${x}'` : x;
}
