// Typed deferred utility. Own module to keep runtime code out of the type barrel (src/types.ts).
// The session parks on one per system utterance until the client reports playback done.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (reason: Error) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
