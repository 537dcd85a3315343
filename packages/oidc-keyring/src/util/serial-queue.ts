/**
 * Promise-chain mutual exclusion.
 */

/**
 * Runs operations one at a time, in submission order.
 *
 * A failed operation rejects its own caller only; the queue keeps going.
 * @internal
 */
export class SerialQueue {
  #tail: Promise<void> = Promise.resolve()

  run<T>(operation: () => Promise<T> | T): Promise<T> {
    const next = this.#tail.then(() => operation())
    this.#tail = next.then(
      () => undefined,
      () => undefined,
    )
    return next
  }
}

/**
 * One {@link SerialQueue} per key, created on first use. Operations on
 * different keys never wait on each other.
 * @internal
 */
export class KeyedSerialQueue {
  readonly #queues = new Map<string, SerialQueue>()

  run<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    let queue = this.#queues.get(key)
    if (queue === undefined) {
      queue = new SerialQueue()
      this.#queues.set(key, queue)
    }
    return queue.run(operation)
  }
}
