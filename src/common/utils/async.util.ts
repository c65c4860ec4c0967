import { OperationTimeoutError } from '../errors/rag-error';

/**
 * Run a task against a deadline.
 * The task receives a signal that aborts when the deadline passes (reason:
 * OperationTimeoutError) or when `parentSignal` aborts, so the underlying
 * request is cancelled rather than left running. The timer is always
 * cleared.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const abortFromParent = () => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    abortFromParent();
  } else {
    parentSignal?.addEventListener('abort', abortFromParent, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new OperationTimeoutError(operation, timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    parentSignal?.removeEventListener('abort', abortFromParent);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isAborted(signal?: AbortSignal): boolean {
  return signal?.aborted ?? false;
}
