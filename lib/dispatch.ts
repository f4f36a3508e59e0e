import * as child_process from 'child_process';
import { waitForExit } from './util/exec';
import { errorCode, errorMessage, SimpleError } from './util/flow';
import * as log from './util/log';

export class DispatchError extends SimpleError {
  constructor(public readonly target: string, cause: unknown) {
    super(`Could not run ${target}: ${errorMessage(cause)}`, exitCodeFor(cause));
    this.name = 'DispatchError';
  }
}

/**
 * Run the formatter with the user's arguments, passing through all stdio
 *
 * Resolves with the formatter's exit code. Signals are not intercepted: the
 * formatter is in our process group and receives them from the terminal too.
 */
export async function dispatch(target: string, args: string[]): Promise<number> {
  log.debug(`Executing ${target} ${args.join(' ')}`);

  let child: child_process.ChildProcess;
  try {
    child = child_process.spawn(target, args, { stdio: 'inherit' });
  } catch (e) {
    throw new DispatchError(target, e);
  }

  try {
    return await waitForExit(child);
  } catch (e) {
    throw new DispatchError(target, e);
  }
}

function exitCodeFor(cause: unknown) {
  switch (errorCode(cause)) {
    case 'EACCES':
    case 'ENOEXEC':
      return 126;
    case 'ENOENT':
      return 127;
    default:
      return 1;
  }
}
