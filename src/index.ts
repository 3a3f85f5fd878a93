export type {
  PromiseAdapter,
  PromiseOrValue,
  Thenable,
} from "./promise/index.js";
export {
  Deferred,
  SyncPromise,
  SyncPromiseAdapter,
  SyncPromiseQueue,
} from "./promise/index.js";

export { DeadlockError, InvariantError } from "./errors/index.js";

export {
  execute,
  executeSync,
  formatExecutionResult,
} from "./execution/index.js";
export { graphql, graphqlSync } from "./graphql.js";

export { setVerbosity as setLogVerbosity } from "ts-invariant";
