/**
 * @file Send Lock
 * @module ws-stream-client/client/send-lock
 */

/**
 * Serializes frame writes.
 *
 * Each task starts after the previous one settles, so writes from
 * concurrent senders never interleave.
 */
export class SendLock {
  private tail: Promise<void> = Promise.resolve()

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task)
    // The caller observes the rejection through `result`; the chain only
    // needs to know the task is finished.
    this.tail = result.then(
      () => undefined,
      () => undefined
    )
    return result
  }
}
