export type { FragmentMap } from "./types/FragmentMap.js";

export { createFragmentMap } from "./createFragmentMap.js";
export { getFragmentDefinitions } from "./getFragmentDefinitions.js";
export { isNonNullObject } from "./isNonNullObject.js";
export { isPromiseLike } from "./isPromiseLike.js";
export { maybeFreeze } from "./maybeFreeze.js";
export { stringifyForDisplay } from "./stringifyForDisplay.js";
