import { z } from 'zod';

/**
 * Standardized exit codes for all CLI commands.
 */
export const ExitCode = {
  Success: 0,
  ValidationError: 2,
  ExternalDependencyFailure: 3,
  UnexpectedBug: 4,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Shared error envelope schema.
 * Every error surfaced to operators uses this shape.
 */
export const SwarmErrorSchema = z.object({
  code: z.string().min(1),
  message: z.string().min(1),
  userMessage: z.string().min(1),
  retryable: z.boolean(),
  cause: z.string().optional(),
  traceId: z.string().optional(),
  context: z.record(z.unknown()).default({}),
});

export type SwarmError = z.infer<typeof SwarmErrorSchema>;

export interface SwarmExceptionOptions {
  code: string;
  message: string;
  userMessage: string;
  retryable?: boolean;
  cause?: unknown;
  context?: Record<string, unknown>;
  exitCode?: ExitCodeValue;
}

/**
 * Typed error class that produces a valid SwarmError envelope.
 */
export class SwarmException extends Error {
  public readonly code: string;
  public readonly userMessage: string;
  public readonly retryable: boolean;
  public readonly context: Record<string, unknown>;
  public readonly exitCode: ExitCodeValue;

  constructor(opts: SwarmExceptionOptions) {
    super(opts.message);
    this.name = 'SwarmException';
    this.code = opts.code;
    this.userMessage = opts.userMessage;
    this.retryable = opts.retryable ?? false;
    this.context = opts.context ?? {};
    this.exitCode = opts.exitCode ?? ExitCode.UnexpectedBug;
    if (opts.cause instanceof Error) {
      this.cause = opts.cause;
    }
  }

  toEnvelope(traceId?: string): SwarmError {
    return SwarmErrorSchema.parse({
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      retryable: this.retryable,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      traceId,
      context: this.context,
    });
  }
}

/**
 * Raised when a gateway operation is requested while no tool server is configured,
 * or when configuration values fail validation.
 */
export class ConfigurationError extends SwarmException {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super({
      code: 'CONFIGURATION_ERROR',
      message,
      userMessage: 'The service is not configured for this operation.',
      retryable: false,
      context,
      exitCode: ExitCode.ValidationError,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Every transport, HTTP status, JSON parse and "no convention succeeded" failure
 * of the tool gateway collapses into this one kind.
 */
export class GatewayError extends SwarmException {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super({
      code: 'GATEWAY_ERROR',
      message,
      userMessage: 'The tool server could not complete the request. Please try again later.',
      retryable: true,
      cause,
      context: { path },
      exitCode: ExitCode.ExternalDependencyFailure,
    });
    this.name = 'GatewayError';
    this.path = path;
  }
}

/**
 * Wrap an unknown thrown value into a SwarmException.
 */
export function toSwarmException(error: unknown): SwarmException {
  if (error instanceof SwarmException) {
    return error;
  }

  if (error instanceof z.ZodError) {
    return new SwarmException({
      code: 'VALIDATION_ERROR',
      message: error.issues.map((i: z.ZodIssue) => i.message).join('; '),
      userMessage: 'Input validation failed. Check your data and try again.',
      retryable: false,
      cause: error,
      context: { issues: error.issues },
      exitCode: ExitCode.ValidationError,
    });
  }

  if (error instanceof Error) {
    return new SwarmException({
      code: 'UNEXPECTED_ERROR',
      message: error.message,
      userMessage: 'An unexpected error occurred. Please report this issue.',
      retryable: false,
      cause: error,
      exitCode: ExitCode.UnexpectedBug,
    });
  }

  return new SwarmException({
    code: 'UNEXPECTED_ERROR',
    message: String(error),
    userMessage: 'An unexpected error occurred.',
    retryable: false,
    exitCode: ExitCode.UnexpectedBug,
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
