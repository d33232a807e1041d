/**
 * Runtime creation
 */

import type { RuntimeOptions } from "./config/options.js";
import { bootstrapCorlib } from "./corlib/bootstrap.js";
import { createRuntimeState } from "./model/state.js";
import type { TypeRuntime } from "./model/types.js";
import { sealRegistrations } from "./registry/name-registry.js";

/**
 * A fresh runtime. Unless `bootstrapCorlib` is false, the built-in types are
 * registered in the core load unit (and built on first use).
 */
export const createRuntime = (options: RuntimeOptions = {}): TypeRuntime => {
  const runtime = createRuntimeState(options);
  if (runtime.options.bootstrapCorlib) {
    bootstrapCorlib(runtime);
  }
  return runtime;
};

/**
 * Mark the registrations made so far as complete. From now on the first
 * access to each type runs its full initialization.
 */
export const initialize = (runtime: TypeRuntime): void => {
  sealRegistrations(runtime);
};
