export {
  ExitCode,
  SwarmErrorSchema,
  SwarmException,
  ConfigurationError,
  GatewayError,
  toSwarmException,
  describeError,
  type SwarmError,
  type ExitCodeValue,
} from './errors.js';
export { SwarmLogger, LOG_LEVELS, type LogLevel, type LogSink, type StructuredLogEntry, type SwarmLoggerOptions } from './logger.js';
export { redactObject, redactContext } from './redact.js';
