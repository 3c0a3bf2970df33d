import { z } from 'zod';
import { ConfigurationError } from './runner/errors.js';
import { LOG_LEVELS } from './runner/logger.js';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value === undefined || value === '' ? undefined : value));

const EnvSchema = z.object({
  TOOL_SERVER_URL: optionalString.pipe(z.string().url().optional()),
  MCP_SERVER_URL: optionalString.pipe(z.string().url().optional()),
  TOOL_SERVER_TIMEOUT_MS: z.coerce.number().int().positive().default(12_000),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform(value => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
  LOG_PATH: optionalString,
  AUGMENT_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  AUGMENT_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  AUGMENT_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  AUGMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  ESCALATION_NOTIFY_TO: z.string().min(1).default('support-leads@example.com'),
  KB_DIR: optionalString,
});

export interface SwarmConfig {
  toolServer: {
    /** Absent means every tool operation is disabled. */
    baseUrl?: string;
    timeoutMs: number;
  };
  logging: {
    level: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    logPath?: string;
  };
  augment: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  escalation: {
    notifyTo: string;
  };
  knowledge: {
    directory?: string;
  };
}

/**
 * Build the process configuration from environment variables.
 * Invalid values raise a ConfigurationError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SwarmConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
    throw new ConfigurationError(
      `Invalid configuration: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
      { variables },
    );
  }

  const values = parsed.data;
  return {
    toolServer: {
      baseUrl: values.TOOL_SERVER_URL ?? values.MCP_SERVER_URL,
      timeoutMs: values.TOOL_SERVER_TIMEOUT_MS,
    },
    logging: {
      level: values.LOG_LEVEL,
      logPath: values.LOG_PATH,
    },
    augment: {
      apiKey: values.AUGMENT_API_KEY ?? values.OPENAI_API_KEY,
      baseUrl: values.AUGMENT_BASE_URL,
      model: values.AUGMENT_MODEL,
      timeoutMs: values.AUGMENT_TIMEOUT_MS,
    },
    escalation: {
      notifyTo: values.ESCALATION_NOTIFY_TO,
    },
    knowledge: {
      directory: values.KB_DIR,
    },
  };
}
