// Main library exports for programmatic use
export { AgentRuntime, createBackend } from './runtime.js';
export { ConversationLoop, ITERATION_LIMIT_MARKER, CANCELLED_MARKER } from './conversation/conversation-loop.js';
export { ConversationStateMachine } from './conversation/state-machine.js';
export { formatOperationResult } from './conversation/prompt-builder.js';

export { SessionScope } from './session/session-scope.js';
export { SessionStore, generateSessionId } from './session/session-store.js';
export { SessionJournal } from './session/session-journal.js';
export { resolveWithin, toDisplayPath, OUTSIDE_SESSION_SENTINEL } from './session/path-boundary.js';

export { ResilientInvoker, computeBackoffDelay, PRIMARY_METHOD, ALTERNATIVES_EXHAUSTED } from './operations/resilient-invoker.js';
export { OperationRegistry } from './operations/registry.js';
export { BaseOperation, succeed, fail } from './operations/types.js';
export { FileSystemOperation } from './operations/filesystem-operation.js';
export { createBuiltinOperations, createDefaultRegistry } from './operations/builtin/index.js';
export { OperationExecutionError, OPERATION_ERROR_KIND_MEANINGS } from './operations/operation-errors.js';

export { extractJson, extractJsonCandidates } from './response/json-extractor.js';
export { normalizeDecision } from './response/response-normalizer.js';
export { validateDecision, createErrorDecision } from './response/decision-validator.js';
export { interpretResponse, parseResponseRecord } from './response/decision-parser.js';

export { AiSdkBackend } from './backends/ai-sdk-backend.js';
export { ScriptedBackend } from './backends/scripted-backend.js';

export { resolveConfiguration } from './config-resolver.js';
export { ConfigurationSchema } from './config.js';
export { ShutdownController } from './shutdown-controller.js';
export { makeTTYLogCallback } from './log-sink-tty.js';
export { BoundaryViolationError, CancelledError, MalformedResponseError, BackendError } from './errors.js';

// Type exports
export type {
  AttemptRecord,
  ConversationMessage,
  Decision,
  DecisionSource,
  LogCallback,
  LogEntry,
  NextStep,
  OperationContext,
  OperationOutcome,
  OperationResult,
} from './types.js';
export type { Backend } from './backends/types.js';
export type { Configuration } from './config.js';
export type { ConversationResult, ConversationSettings } from './conversation/conversation-loop.js';
export type { Operation, JsonSchema } from './operations/types.js';
export type { OperationErrorKind } from './operations/operation-errors.js';
