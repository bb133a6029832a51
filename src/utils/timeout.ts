import { TimeoutError } from "../providers/errors.js";

/**
 * Run `task` with an AbortSignal that fires after `ms`. Rejects with
 * TimeoutError when the deadline passes first, even if the task ignores
 * the signal. A non-positive `ms` disables the deadline.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  if (ms <= 0) {
    return task(controller.signal);
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = new TimeoutError(label, ms);
      controller.abort(err);
      reject(err);
    }, ms);
    timer.unref?.();

    task(controller.signal).then(
      (val) => {
        clearTimeout(timer);
        resolve(val);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
