export {
  findBalancedObject,
  dictLiteralToJson,
  decodeObject,
  scanKeyValues,
  coerceScalar,
  coerceArgumentValues,
  parseArgumentPayload,
  extractArgumentsFromText,
  type BalancedSpan,
  type DecodedPayload,
  type PayloadDecoding,
} from './args.js';

export {
  extractToolCall,
  extractToolObservations,
  parseToolMarker,
  type ExtractToolOptions,
  type ExtractionSource,
} from './tools.js';

export {
  extractToolResponses,
  contentText,
  parseResponseLine,
  warningsFromToolResponses,
  warningsFromText,
  type ToolResponse,
} from './responses.js';
