/**
 * Bounded waits for collaborator calls
 */
import { CancelledError, CollaboratorStep, TimeoutError } from '../errors';

/**
 * Run `task` with its own AbortSignal that fires when `timeoutMs` elapses or
 * `parent` aborts, whichever comes first.
 *
 * @throws TimeoutError when the budget runs out
 * @throws CancelledError when `parent` aborts
 */
export async function withTimeout<T>(
  step: CollaboratorStep,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  if (parent?.aborted) {
    throw new CancelledError();
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so the race reports the timeout, not the task's abort error
      reject(new TimeoutError(step, timeoutMs));
      controller.abort();
    }, timeoutMs);

    onParentAbort = () => {
      reject(new CancelledError());
      controller.abort();
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
}
