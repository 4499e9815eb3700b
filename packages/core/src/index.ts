/**
 * @streamplan/core
 * 
 * Core package containing:
 * - Error handling
 * - Stream vocabulary shared by the probe and mapping layers
 */

// Errors
export {
  StreamPlanError,
  ValidationError,
  PreconditionError,
  ProbeDocumentError,
  LookupError,
  CommandExecutionError,
  errorMessage,
} from './errors/index.js';

// Streams
export {
  CODEC_TYPES,
  TYPE_LETTERS,
  isCodecType,
  streamSelector,
  streamSpecifier,
  type CodecType,
} from './streams.js';
