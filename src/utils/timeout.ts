import { CancelledError, TimeoutError } from '../errors.js';

/**
 * Run `operation` with its own AbortSignal that fires when either `timeoutMs`
 * elapses or `parent` aborts. The returned promise settles as soon as either
 * happens, even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) throw new CancelledError();

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const err = new CancelledError(`${label} cancelled`);
        controller.abort(err);
        reject(err);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
