export {
  defineEvent,
  EventBus,
  type EventDefinition,
  EventTimeoutError,
} from "./bus.js";

export {
  budgetClosed,
  budgetExceeded,
  type GatewayEventName,
  type GatewayEventPayload,
  GatewayEvents,
  rateLimitThrottle,
  rateLimitTimeout,
  retryAttempt,
  retryCompleted,
} from "./gateway-events.js";
