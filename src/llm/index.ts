/**
 * Structured output from unreliable models.
 */

export {
  parseModelJson,
  stripCodeFences,
  findBalancedObject,
  PARSE_FAILURE_MESSAGE,
  RAW_EXCERPT_CHARS,
  type JsonObject,
  type ParsedJson,
} from './json.js';

export {
  StructuredOutputCaller,
  advanceStructuredCall,
  buildRepairPrompt,
  REPAIR_EXCERPT_CHARS,
  type StructuredCallState,
  type PendingCallState,
  type SettledCallState,
  type StructuredCallOptions,
  type StructuredCallResult,
  type StructuredOutputCallerOptions,
} from './structured.js';
