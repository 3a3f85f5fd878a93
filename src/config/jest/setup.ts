globalThis.__DEV__ = true;

import { disableFragmentWarnings } from "graphql-tag";

import { setLogVerbosity } from "../../index.js";

setLogVerbosity("log");

// Turn off warnings for repeated fragment names
disableFragmentWarnings();
