export type { PromiseAdapter, PromiseOrValue, Thenable } from "./types.js";

export { Deferred } from "./Deferred.js";
export { SyncPromise } from "./SyncPromise.js";
export { SyncPromiseAdapter } from "./SyncPromiseAdapter.js";
export { SyncPromiseQueue } from "./SyncPromiseQueue.js";
