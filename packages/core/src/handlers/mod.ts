export { ancestorsOf } from "~/handlers/hierarchy.ts";
export { ErrorHandlerRegistry } from "~/handlers/registry.ts";
export type { ErrorHandlerRegistryOptions } from "~/handlers/registry.ts";
export {
  describeUrl,
  DOUBLE_FAULT_BODY,
  ErrorDispatcher,
} from "~/handlers/dispatcher.ts";
export type { ErrorDispatcherOptions } from "~/handlers/dispatcher.ts";
export { fail, settle, succeed } from "~/handlers/outcome.ts";
export type { Outcome } from "~/handlers/outcome.ts";
export type {
  AncestorResolver,
  ErrorHandlerFn,
  FaultRequest,
  HandlerEntry,
  HandlerResult,
  LookupStrategy,
} from "~/handlers/types.ts";
