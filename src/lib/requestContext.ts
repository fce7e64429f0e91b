import { AsyncLocalStorage } from 'node:async_hooks';

const requestIds = new AsyncLocalStorage<string>();

export function withRequestId<T>(requestId: string, fn: () => T): T {
  return requestIds.run(requestId, fn);
}

/** Id of the HTTP request the caller is running under, if any. */
export function currentRequestId(): string | undefined {
  return requestIds.getStore();
}
