export { DeadlockError } from "./DeadlockError.js";
export { InvariantError } from "../utilities/invariant/index.js";
