import * as child_process from 'child_process';
import * as os from 'os';
import * as stream from 'stream';

export interface RunCommandOptions {
  readonly cwd?: string;

  /**
   * Let stderr through to our own stderr instead of capturing it
   *
   * @default false
   */
  readonly inheritStderr?: boolean;
}

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  /**
   * Empty if stderr was inherited
   */
  readonly stderr: string;
}

/**
 * Run a command to completion and collect its output
 *
 * Never fails on a nonzero exit code, only if the command could not be started.
 */
export async function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  const child = child_process.spawn(command, args, {
    cwd: options.cwd,
    stdio: ['inherit', 'pipe', options.inheritStderr ? 'inherit' : 'pipe'],
  });

  const [exitCode, stdout, stderr] = await Promise.all([
    waitForExit(child),
    readStream(child.stdout),
    readStream(child.stderr),
  ]);

  return {
    exitCode,
    stdout: stdout.toString('utf-8'),
    stderr: stderr.toString('utf-8'),
  };
}

/**
 * Resolve with the exit code of a child process
 *
 * A child killed by a signal gets the shell convention of 128 + signal number.
 */
export function waitForExit(child: child_process.ChildProcess): Promise<number> {
  return new Promise((ok, ko) => {
    child.once('error', ko);
    child.once('close', (code, signal) => {
      ok(code ?? signalExitCode(signal));
    });
  });
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) { return 1; }
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

async function readStream(strm: stream.Readable | null): Promise<Buffer> {
  if (strm === null) { return Buffer.alloc(0); }

  return new Promise((ok, ko) => {
    const data = new Array<Buffer>();

    strm.on('data', (chunk: Buffer) => {
      data.push(chunk);
    });

    strm.on('end', () => {
      ok(Buffer.concat(data));
    });

    strm.on('error', (err) => {
      ko(err);
    });
  });
}
