export { BudgetLedger, ScopeHandle } from './budget-ledger.js';
export type { BudgetLedgerOptions } from './budget-ledger.js';
export { AdmissionLimiter, AdmissionGrant } from './admission-limiter.js';
export type { AdmissionLimiterOptions, AdmitOptions, LimiterStats } from './admission-limiter.js';
export { CallEnvelope, backoffDelay } from './call-envelope.js';
export type { CallEnvelopeOptions, ExecuteOptions } from './call-envelope.js';
export { CallLog } from './call-log.js';
export type { CallStart, CallCompletion, EndpointSummary } from './call-log.js';
export { shape, describeShape, formatInstructions, conformsTo, shapeIssues } from './shapes.js';
export { extractJson, extractYesNo } from './response-parsing.js';
export type { ExtractResult, KeywordResult } from './response-parsing.js';
export {
  runSemanticLoop,
  shapeInterpreter,
  yesNoInterpreter,
  buildPrompt,
} from './typed-invocation.js';
export type { ResponseInterpreter, SemanticLoopOptions, TypedResult } from './typed-invocation.js';
export { settleAll } from './batching.js';
export type { Settled, SettleOptions } from './batching.js';
export { ModelGateway } from './gateway.js';
export type { ModelGatewayOptions, InvokeOptions, TypedInvokeOptions } from './gateway.js';
export { ConfigManager, CONFIG_FILE_NAMES } from './config-manager.js';
export type { LoadOptions } from './config-manager.js';
export { createLogger, getLogger, setLogger, isLogLevel } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
