/**
 * Runs tasks strictly one after another in submission order.
 * The credential file and the ledger assume a single writer; chat updates
 * pass through this before reaching a handler.
 */
export function createSerialQueue() {
  let tail: Promise<unknown> = Promise.resolve();

  return function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = tail.then(task);
    // The caller observes the rejection through `result`; the chain only
    // needs to know the task settled
    tail = result.catch(() => undefined);
    return result;
  };
}
