/**
 * Handlers module exports
 */

export { HandlerRegistry } from "./registry.js";
export { CONTINUE_HANDLING, createRegistration } from "./registration.js";
export { StepHandlerStore } from "./steps.js";
export type { PendingStep } from "./steps.js";
export type {
  Callback,
  Handler,
  HandlerContext,
  HandlerRegistration,
  RegistrationHandle,
  RegistrationOptions,
} from "./registration.js";
