export { createModelInvoker, ModelInvoker } from "./invoker.js";
export type { InvocationRequest, InvocationResult, InvokeOptions, ModelInvokerOptions } from "./types.js";
