/**
 * FIFO mutual exclusion for everything that touches the browser page.
 *
 * Operations queue on a promise chain; a failed operation releases the lock
 * for the next one. Not reentrant: calling run() from inside run() deadlocks.
 */

export interface OperationLock {
  run<T>(fn: () => Promise<T> | T): Promise<T>
  /** Number of operations running or waiting */
  readonly pending: number
}

export function createOperationLock(): OperationLock {
  let chain: Promise<void> = Promise.resolve()
  let pending = 0

  return {
    run<T>(fn: () => Promise<T> | T): Promise<T> {
      pending++
      const release = () => {
        pending--
      }
      const next = chain.then(fn, fn)
      chain = next.then(release, release)
      return next
    },
    get pending() {
      return pending
    },
  }
}
