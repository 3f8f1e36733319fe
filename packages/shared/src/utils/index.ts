export { generateId } from './id.js';
export { monotonicNow, isoNow, realClock } from './clock.js';
export type { Clock } from './clock.js';
export { calculateCost } from './cost.js';
export { stripCodeFence, cleanIndents, estimateTokens } from './text.js';
export { linkSignals, whenAborted } from './signals.js';
export type { LinkedSignal } from './signals.js';
export {
  TollgateError,
  ProviderFailure,
  ConfigError,
  UnknownEndpointError,
  ScopeClosedError,
  BudgetExceededError,
  AdmissionTimeoutError,
  CallTimeoutError,
  CallCancelledError,
  ProviderFatalError,
  CallExhaustedError,
  TypeValidationExhaustedError,
  toErrorPayload,
} from './errors.js';
export type { FailureKind, FailureReason, BudgetExceededInfo, ErrorPayload } from './errors.js';
