import type { MessageBus } from "../messaging/bus.js";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function createDeferred<T = unknown>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending executions settle, then wait for the bus to go quiet. */
export async function settle(bus: MessageBus): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
  await bus.flush();
}
