import { TimeoutError } from '../tts/errors.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('Timeout');

/**
 * Race a task against a fixed ceiling. On expiry `onTimeout` runs first (to
 * cancel whatever the task is waiting on), then the returned promise rejects
 * with TimeoutError. A late settlement of the task is ignored.
 */
export function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout: () => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      try {
        onTimeout();
      } catch (err) {
        logger.warn({ err, operation }, 'Cancellation after timeout failed');
      }
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);

    task.then(
      (value) => {
        clearTimeout(timeoutId);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timeoutId);
        reject(err);
      }
    );
  });
}
