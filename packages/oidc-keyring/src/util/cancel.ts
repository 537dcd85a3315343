import { OperationCancelledError } from '../errors.js'

/**
 * Throw {@link OperationCancelledError} if `signal` has fired.
 * @internal
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted === true) {
    throw new OperationCancelledError(`${operation} was cancelled`, { cause: signal.reason })
  }
}
